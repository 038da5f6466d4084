import type { Distribution, Histogram } from "../src/index";

/* ────────────────────────────── Constants ────────────────────────────── */

const FULL = "█";
const PARTIAL = ["", "▏", "▎", "▍", "▌", "▋", "▊", "▉"]; // 1/8 … 7/8

const B = {
  tl: "┌",
  tr: "┐",
  bl: "└",
  br: "┘",
  mm: "┼",
  bm: "┴",
  ml: "├",
  mr: "┤",
  h: "─",
  v: "│",
} as const;

type Align = "left" | "right";

const termWidth = () => process.stdout.columns ?? 80;
const clamp01 = (n: number) => Math.max(0, Math.min(1, n));

/** Success probabilities the parameter sweep reports thresholds for. */
export const THRESHOLD_LEVELS = [1 / 8, 1 / 4, 1 / 2] as const;

/* ───────────────────────────── Print Helpers ───────────────────────────── */

export function sep(title: string) {
  console.log(`\n===== ${title} =====\n`);
}

export function pct(x: number) {
  return `${(x * 100).toFixed(2)}%`;
}

/** Reads a non-negative integer argument, falling back when absent. */
export function intArg(raw: string | undefined, fallback: number, name: string): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    console.error(`Invalid ${name}: ${raw}`);
    process.exit(1);
  }
  return value;
}

/* ───────────────────────────── Box & Tables ───────────────────────────── */

/** Generic N-column divider: e.g. ├──┼──┼──┤ */
function dividerN(
  widths: number[],
  left: string = B.ml,
  mid: string = B.mm,
  right: string = B.mr
): string {
  const seg = (w: number) => B.h.repeat(w + 2);
  return left + widths.map(seg).join(mid) + right;
}

function padCell(text: string, width: number, align: Align) {
  return " " + (align === "right" ? text.padStart(width) : text.padEnd(width)) + " ";
}

function rowN(cells: string[], widths: number[], aligns: Align[]) {
  const body = cells.map((c, i) => padCell(c, widths[i], aligns[i] ?? "left")).join(B.v);
  return `${B.v}${body}${B.v}`;
}

/** Table with a title tab on its top-left corner; column widths fit the data. */
function buildTableWithTab(
  title: string,
  headers: string[],
  dataRows: string[][],
  aligns: Align[]
): string[] {
  const widths = headers.map((h, i) =>
    Math.max(h.length, ...dataRows.map((row) => (row[i] ?? "").length))
  );
  const tabText = ` ${title} `;
  const tabWidth = Math.max(12, tabText.length);
  const tableWidth = widths.reduce((sum, w) => sum + w + 2, 0) + widths.length + 1;

  const lines: string[] = [];
  lines.push(B.tl + B.h.repeat(tabWidth) + B.tr);
  lines.push(B.v + tabText.padEnd(tabWidth) + B.v);
  lines.push(B.ml + B.h.repeat(tabWidth) + B.bm + B.h.repeat(Math.max(0, tableWidth - tabWidth - 3)) + B.tr);

  if (headers.some((h) => h.trim().length > 0)) {
    lines.push(rowN(headers, widths, aligns));
    lines.push(dividerN(widths));
  }
  for (const row of dataRows) lines.push(rowN(row, widths, aligns));
  lines.push(dividerN(widths, B.bl, B.bm, B.br));
  return lines;
}

export function printTableWithTab(
  title: string,
  headers: string[],
  dataRows: string[][],
  aligns: Align[]
): void {
  buildTableWithTab(title, headers, dataRows, aligns).forEach((line) => console.log(line));
  console.log("");
}

/* ───────────────────────────── Bar Charts ───────────────────────────── */

function renderBar(fraction: number, width: number): string {
  const total = clamp01(fraction) * width;
  const full = Math.floor(total);
  const rem = total - full;
  // show a tiny sliver when nonzero remainder exists
  const partialIndex = rem === 0 ? 0 : Math.max(1, Math.min(7, Math.floor(rem * 8)));
  return (FULL.repeat(full) + PARTIAL[partialIndex]).padEnd(width, " ");
}

type ChartRow = { label: number; p: number };

function buildBarChartLines(rows: ChartRow[], width: number): string[] {
  if (rows.length === 0) return ["<no data>"];

  const labelWidth = Math.max(...rows.map((r) => String(r.label).length));
  const pctWidth = Math.max(...rows.map((r) => pct(r.p).length));
  const barWidth = Math.max(1, width - labelWidth - pctWidth - 6);
  const maxP = Math.max(...rows.map((r) => r.p)) || 1;

  return rows.map(
    ({ label, p }) =>
      ` ${String(label).padStart(labelWidth)}: ${renderBar(p / maxP, barWidth)} ${pct(p).padStart(pctWidth)} `
  );
}

/* ───────────────────────────── Reports ───────────────────────────── */

export function printSummary(title: string, hist: Histogram, extra: Array<[string, string]> = []) {
  const rows: Array<[string, string]> = [
    ...extra,
    ["Mean pnodes:", hist.mean().toFixed(3)],
    ["Std dev:", hist.stddev().toFixed(3)],
    ["Range:", hist.isEmpty() ? "—" : `${hist.min()}..${hist.max()}`],
    ["Total mass:", hist.mass().toFixed(12)],
  ];
  printTableWithTab(title, ["", ""], rows, ["left", "right"]);
}

export function printHistogramChart(hist: Histogram, label?: string): void {
  const rows = hist.entries.map(([label, p]) => ({ label, p }));
  const lines = buildBarChartLines(rows, termWidth() - 4);
  printTableWithTab(`Histogram ${label ? `(${label})` : ""}`, [""], lines.map((l) => [l]), ["left"]);
}

export function printCDFChart(hist: Histogram, label?: string): void {
  const { support, data } = hist.toCDFSeries();
  const rows = support.map((x, i) => ({ label: x, p: data[i] }));
  const lines = buildBarChartLines(rows, termWidth() - 4);
  printTableWithTab(`CDF ${label ? `(${label})` : ""}: P(X ≤ x)`, [""], lines.map((l) => [l]), ["left"]);
}

export function printThresholds(hist: Histogram): void {
  const rows = THRESHOLD_LEVELS.map((level) => [pct(level), String(hist.quantile(level))]);
  printTableWithTab("Thresholds", ["P(X ≤ T) ≥", "T"], rows, ["left", "right"]);
}

/** The most likely configurations, largest first. */
export function printTopConfigurations(dist: Distribution, limit = 10): void {
  const top = [...dist.sorted()].sort((a, b) => b.p - a.p).slice(0, limit);
  const rows = top.map(({ config, p }) => [config.toString(), String(config.totalCount()), pct(p)]);
  printTableWithTab("Top configurations", ["CONFIG", "PNODES", "PERCENT"], rows, ["left", "right", "right"]);
}
