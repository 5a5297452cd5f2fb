// ANSI colour helpers shared by the CLI, logger and permission prompt

const colors = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
  cyan: "\x1b[36m",
};

export type Color = Exclude<keyof typeof colors, "reset">;

export function color(text: string, c: Color): string {
  return `${colors[c]}${text}${colors.reset}`;
}
