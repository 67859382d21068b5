import chalk from "chalk";

type Cell = string | number | boolean | undefined | null;

export function table(headers: string[], rows: Cell[][]): void {
  const widths = headers.map((h, i) =>
    Math.max(h.length, ...rows.map((r) => String(r[i] ?? "").length)),
  );

  console.log(headers.map((h, i) => chalk.bold(h.padEnd(widths[i] ?? 0))).join("  "));
  console.log(widths.map((w) => "─".repeat(w)).join("  "));

  for (const row of rows) {
    console.log(row.map((cell, i) => String(cell ?? "").padEnd(widths[i] ?? 0)).join("  "));
  }
}

export function heading(text: string): void {
  console.log(chalk.bold.cyan(text));
}

export function success(text: string): void {
  console.log(chalk.green(text));
}

export function warn(text: string): void {
  console.warn(chalk.yellow(`Warning: ${text}`));
}

export function error(text: string): void {
  console.error(chalk.red(`Error: ${text}`));
}

export function info(text: string): void {
  console.log(chalk.dim(text));
}

export function json(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function blank(): void {
  console.log();
}
