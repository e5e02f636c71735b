import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import * as core from "@actions/core";

const PREVIEW_LENGTH = 2000;

export function defaultOutputPath(now: Date): string {
  const stamp = [
    now.getFullYear(),
    String(now.getMonth() + 1).padStart(2, "0"),
    String(now.getDate()).padStart(2, "0"),
  ].join("");
  return `econ_digest_${stamp}.md`;
}

export function previewReport(report: string): string {
  if (report.length <= PREVIEW_LENGTH) return report;
  return `${report.slice(0, PREVIEW_LENGTH)}\n\n... [truncated] ...`;
}

export async function writeReport(
  report: string,
  outputPath: string
): Promise<void> {
  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, report, "utf-8");

  core.info(`Digest saved to: ${outputPath}`);
  core.info(`Preview:\n${previewReport(report)}`);
}
