import chalk from "chalk";

export function warning(msg: string): void {
  console.error(chalk.yellow("WARNING") + ": " + msg);
}

export function error(msg: string): void {
  console.error(chalk.red("ERROR") + ": " + msg);
}

/** Echo of an external command line (verbose mode). */
export function command(line: string): void {
  console.log(chalk.dim("  $ " + line));
}

export function clockTime(now: Date): string {
  return [now.getHours(), now.getMinutes(), now.getSeconds()]
    .map((n) => String(n).padStart(2, "0"))
    .join(":");
}

export function sectionLine(title: string, now: Date): string {
  return `==> [${clockTime(now)}] ${title}`;
}

export function section(title: string, now: Date = new Date()): void {
  console.log();
  console.log(chalk.bold(sectionLine(title, now)));
}
