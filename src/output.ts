import path from 'node:path';
import { promises as fs } from 'node:fs';
import { stringify } from 'csv-stringify/sync';
import type { ResultTable, RunMetadata, SourceKind } from './types';

function timestampId(now = new Date()): string {
  return now.toISOString().replace(/[:.]/g, '-');
}

export function tableToCsv(table: ResultTable): string {
  return stringify(table.rows, {
    header: true,
    columns: table.columns,
    cast: {
      boolean: (value) => (value ? 'true' : 'false'),
      date: (value) => value.toISOString()
    }
  });
}

export async function writeOutputs(
  outputDir: string,
  source: SourceKind,
  table: ResultTable,
  metadata: Omit<RunMetadata, 'outputJson' | 'outputCsv'>
): Promise<RunMetadata> {
  await fs.mkdir(outputDir, { recursive: true });
  const stamp = timestampId();

  const jsonPath = path.join(outputDir, `${source}.${stamp}.json`);
  const csvPath = path.join(outputDir, `${source}.${stamp}.csv`);
  const metaPath = path.join(outputDir, `run.${stamp}.meta.json`);

  await fs.writeFile(jsonPath, JSON.stringify(table.rows, null, 2), 'utf8');
  await fs.writeFile(csvPath, tableToCsv(table), 'utf8');

  const fullMeta: RunMetadata = {
    ...metadata,
    outputJson: jsonPath,
    outputCsv: csvPath
  };

  await fs.writeFile(metaPath, JSON.stringify(fullMeta, null, 2), 'utf8');

  return fullMeta;
}
