// Corpus Accessor - loads feedback records from the CSV export
import { CorpusLoadError, errorMessage } from "../rag/errors";
import {
  type CorpusLoadResult,
  type DatasetInfo,
  type FeedbackRecord,
  FeedbackRowSchema,
} from "./types";
import { createHash } from "crypto";
import { readFile, stat } from "fs/promises";
import { basename } from "path";
import Papa from "papaparse";

/**
 * Parse CSV text into validated, frozen feedback records.
 * Rows with empty feedback text or invalid fields are skipped and reported.
 */
export function parseFeedbackCsv(csvText: string): CorpusLoadResult {
  const parsed = Papa.parse<Record<string, string>>(csvText, {
    header: true,
    skipEmptyLines: true,
    transformHeader: header => header.trim(),
  });

  const records: FeedbackRecord[] = [];
  const skipped: CorpusLoadResult["skipped"] = [];
  const seenIds = new Set<string>();

  parsed.data.forEach((raw, index) => {
    // Header is line 1
    const row = index + 2;
    const validation = FeedbackRowSchema.safeParse(raw);
    if (!validation.success) {
      const issue = validation.error.issues[0];
      skipped.push({ row, reason: `${issue.path.join(".")}: ${issue.message}` });
      return;
    }

    const data = validation.data;
    if (!data.feedback_text) {
      skipped.push({ row, reason: "empty feedback_text" });
      return;
    }
    if (seenIds.has(data.feedback_id)) {
      skipped.push({ row, reason: `duplicate feedback_id ${data.feedback_id}` });
      return;
    }
    seenIds.add(data.feedback_id);

    records.push(
      Object.freeze({
        id: data.feedback_id,
        source: data.source,
        date: data.date,
        userId: data.user_id,
        text: data.feedback_text,
        sentiment: data.sentiment,
      }),
    );
  });

  return { records: Object.freeze(records), skipped };
}

/**
 * Load the corpus from disk. Any failure here is fatal to the caller.
 */
export async function loadFeedbackCorpus(csvPath: string): Promise<CorpusLoadResult> {
  let csvText: string;
  try {
    csvText = await readFile(csvPath, "utf-8");
  } catch (error) {
    throw new CorpusLoadError(`Cannot read feedback corpus at ${csvPath}: ${errorMessage(error)}`, { cause: error });
  }

  const result = parseFeedbackCsv(csvText);
  if (result.records.length === 0) {
    throw new CorpusLoadError(`No valid feedback records found in ${csvPath}`);
  }

  if (result.skipped.length > 0) {
    console.warn(`Skipped ${result.skipped.length} invalid feedback rows in ${basename(csvPath)}`);
  }
  console.log(`Loaded ${result.records.length} feedback records`);

  return result;
}

/**
 * SHA-256 over the corpus snapshot. Two evaluation runs are comparable only when
 * their fingerprints match.
 */
export function computeCorpusFingerprint(records: readonly FeedbackRecord[]): string {
  const hash = createHash("sha256");
  for (const record of records) {
    hash.update(JSON.stringify([record.id, record.source, record.date, record.userId, record.text, record.sentiment]));
    hash.update("\n");
  }
  return hash.digest("hex").slice(0, 16);
}

export function formatFileSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Describe the corpus file for the dataset-info endpoint.
 */
export async function getDatasetInfo(csvPath: string): Promise<DatasetInfo> {
  const filename = basename(csvPath);

  try {
    const [stats, csvText] = await Promise.all([stat(csvPath), readFile(csvPath, "utf-8")]);
    const { records } = parseFeedbackCsv(csvText);

    return {
      filename,
      recordCount: records.length,
      lastUpdated: formatTimestamp(stats.mtime),
      fileSize: formatFileSize(stats.size),
      status: "Loaded",
    };
  } catch (error) {
    console.error(`Dataset info unavailable for ${csvPath}:`, errorMessage(error));
    return {
      filename,
      recordCount: 0,
      lastUpdated: "Not found",
      fileSize: "0 B",
      status: "Disconnected",
    };
  }
}
