import * as path from "node:path";
import type { GapReport, GridBatchResult, GridCandidate, RenameReport, StitchResult } from "./types.js";

export function formatGridCandidate(g: GridCandidate): string {
  const size = `${String(g.rows).padStart(3)}×${String(g.cols).padEnd(3)}`;
  if (g.exact) {
    return `✓ ${size}  (0 blanks) PERFECT`;
  }
  return `  ${size}  (${g.blanks} blank${g.blanks === 1 ? "" : "s"})`;
}

export function formatGridCandidates(count: number, grids: GridCandidate[]): string {
  return [`Total files: ${count}`, ...grids.map(formatGridCandidate)].join("\n");
}

export function formatStitchResult(result: StitchResult): string {
  const lines = [
    `Stitched ${result.tileCount} image(s) → ${result.width}×${result.height} (${result.label})`,
  ];
  if (result.blanks > 0) {
    lines.push(`Blank tiles: ${result.blanks}`);
  }
  lines.push(`Saved to: ${result.outputPath}`);
  return lines.join("\n");
}

export function formatGridBatch(batch: GridBatchResult): string {
  const total = batch.results.length + batch.failures.length;
  const lines = batch.results.map((r) => `✓ ${r.label}: ${path.basename(r.outputPath)}`);
  for (const f of batch.failures) {
    lines.push(`✗ ${f.rows}x${f.cols}: ${f.message}`);
  }
  lines.push(
    batch.failures.length === 0
      ? `Stitched all ${batch.results.length} grid combination(s)`
      : `Completed ${batch.results.length}/${total} stitches`
  );
  return lines.join("\n");
}

export function formatRenameReport(report: RenameReport): string {
  const lines = report.renamed.map((e) => `"${e.source}" → "${e.target}"`);
  lines.push(
    `Renamed ${report.renamed.length} file(s) in ${report.directory}` +
      (report.unchanged.length > 0 ? `, ${report.unchanged.length} unchanged` : "")
  );
  return lines.join("\n");
}

export function formatGapReport(report: GapReport): string {
  if (report.total === 0) {
    return "Gaps: (none yet)";
  }
  return `Gaps: ${report.gaps.join("  ")}   |   Total: ${report.total}   |   Sum: ${report.sum}`;
}
