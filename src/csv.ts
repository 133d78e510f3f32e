import fs from "fs";
import path from "path";

export type CsvValue = string | number | boolean | Date | null | undefined;

export function ensureDataDir(dir = path.join(process.cwd(), "data")) {
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  return dir;
}

function cell(v: CsvValue): string {
  if (v === null || v === undefined) return "";
  const s = (v instanceof Date ? v.toISOString() : String(v)).replace(/"/g, '""');
  return /[",\n]/.test(s) ? `"${s}"` : s;
}

export function toCSV(rows: Array<Record<string, CsvValue>>): string {
  if (rows.length === 0) return "";
  const headers = Object.keys(rows[0]);
  return [headers.join(","), ...rows.map(r => headers.map(h => cell(r[h])).join(","))].join("\n");
}

export function writeCSV(filename: string, rows: Array<Record<string, CsvValue>>, dir?: string) {
  const file = path.join(ensureDataDir(dir), filename);
  fs.writeFileSync(file, toCSV(rows));
  return file;
}
