const NEEDS_QUOTING = /[",\r\n]/;

export function escapeCsvCell(cell: string): string {
  if (!NEEDS_QUOTING.test(cell)) return cell;
  return `"${cell.replace(/"/g, '""')}"`;
}

export function toCsv(headers: string[], rows: string[][]): string {
  const lines = [headers, ...rows].map((r) => r.map(escapeCsvCell).join(","));
  return lines.join("\n") + "\n";
}
