import fs from 'fs';
import path from 'path';
import { CONFIG } from '../config';

/**
 * Write a standings or draw payload to the output directory as JSON.
 */
export function exportToJson(payload: unknown, filename: string): string {
  const outputDir = CONFIG.OUTPUT_DIR;
  if (!fs.existsSync(outputDir)) {
    fs.mkdirSync(outputDir, { recursive: true });
  }

  const filePath = path.join(outputDir, filename);
  fs.writeFileSync(filePath, JSON.stringify(payload, null, 2), 'utf-8');
  return filePath;
}
