export interface InstallInfo {
  frontUrl: string;
  adminUrl: string;
  username: string;
  password: string;
}

const LABEL_WIDTH = 8;

export function formatInstallInfo(info: InstallInfo): string[] {
  const rows: Array<[string, string]> = [
    ["FrontURL", info.frontUrl],
    ["AdminURL", info.adminUrl],
    ["Username", info.username],
    ["Password", info.password],
  ];
  const valueWidth = Math.max(...rows.map(([, value]) => value.length));
  const border = `+ ${"-".repeat(LABEL_WIDTH)} + ${"-".repeat(valueWidth)} + `;

  const lines = [border];
  for (const [label, value] of rows) {
    lines.push(`+ ${label.padEnd(LABEL_WIDTH)} + ${value.padEnd(valueWidth)} + `);
    lines.push(border);
  }
  return lines;
}

export function printInstallInfo(info: InstallInfo): void {
  for (const line of formatInstallInfo(info)) {
    console.log(line);
  }
}
