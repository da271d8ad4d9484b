import type { QualityReport } from "../analyzers/types";
import * as fs from "fs";
import * as path from "path";

export function writeJsonReport(reports: QualityReport[], outputDir: string): string {
  const filePath = path.join(outputDir, "quality-report.json");
  fs.mkdirSync(outputDir, { recursive: true });
  const payload = { generatedAt: new Date().toISOString(), reports };
  fs.writeFileSync(filePath, JSON.stringify(payload, null, 2), "utf-8");
  return filePath;
}
