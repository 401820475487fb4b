//slotcore/utils/colors.ts

// ANSI color helpers for console output.

export const Colors = {
  Reset: "\x1b[0m",

  FgRed: "\x1b[31m",
  FgGreen: "\x1b[32m",
  FgYellow: "\x1b[33m",

  BrightCyan: "\x1b[96m",
};

export type ColorCode = (typeof Colors)[keyof typeof Colors] | string;

export function colorize(text: string, color?: ColorCode): string {
  if (!color) return text;
  return `${color}${text}${Colors.Reset}`;
}
