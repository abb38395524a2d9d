// Indexing - split feedback records into passages
import type { FeedbackRecord } from "../corpus/types";
import { RAG_CONFIG } from "./config";
import type { Passage } from "./types";
import { SentenceSplitter } from "llamaindex";

export type ChunkingOptions = {
  chunkSize: number;
  chunkOverlap: number;
};

export type ParentChildPassages = {
  parents: Map<string, Passage>;
  children: Passage[];
};

function splitRecord(splitter: SentenceSplitter, record: FeedbackRecord): string[] {
  return splitter
    .splitText(record.text)
    .map(chunk => chunk.trim())
    .filter(chunk => chunk.length > 0);
}

/**
 * Chunk every record into flat passages.
 * Passage ids are deterministic: `${recordId}#${chunkIndex}`.
 */
export function chunkRecords(
  records: readonly FeedbackRecord[],
  options: ChunkingOptions = { chunkSize: RAG_CONFIG.chunkSize, chunkOverlap: RAG_CONFIG.chunkOverlap },
): Passage[] {
  const splitter = new SentenceSplitter({
    chunkSize: options.chunkSize,
    chunkOverlap: options.chunkOverlap,
  });

  const passages: Passage[] = [];
  for (const record of records) {
    splitRecord(splitter, record).forEach((text, idx) => {
      passages.push({ id: `${record.id}#${idx}`, text, recordIds: [record.id] });
    });
  }
  return passages;
}

/**
 * Two-level chunking for the parent-document strategy: large parent blocks for
 * context, small child chunks for matching. Children point at their parent.
 */
export function buildParentChildPassages(
  records: readonly FeedbackRecord[],
  options: { parentChunkSize: number; childChunkSize: number; childChunkOverlap: number } = {
    parentChunkSize: RAG_CONFIG.parentChunkSize,
    childChunkSize: RAG_CONFIG.childChunkSize,
    childChunkOverlap: RAG_CONFIG.childChunkOverlap,
  },
): ParentChildPassages {
  const parentSplitter = new SentenceSplitter({ chunkSize: options.parentChunkSize, chunkOverlap: 0 });
  const childSplitter = new SentenceSplitter({
    chunkSize: options.childChunkSize,
    chunkOverlap: options.childChunkOverlap,
  });

  const parents = new Map<string, Passage>();
  const children: Passage[] = [];

  for (const record of records) {
    splitRecord(parentSplitter, record).forEach((parentText, p) => {
      const parentId = `${record.id}#p${p}`;
      parents.set(parentId, { id: parentId, text: parentText, recordIds: [record.id] });

      childSplitter
        .splitText(parentText)
        .map(chunk => chunk.trim())
        .filter(chunk => chunk.length > 0)
        .forEach((childText, c) => {
          children.push({ id: `${parentId}c${c}`, text: childText, recordIds: [record.id], parentId });
        });
    });
  }

  return { parents, children };
}

/**
 * One passage per record, used as reference context for golden examples.
 */
export function recordPassage(record: FeedbackRecord): Passage {
  return { id: `record:${record.id}`, text: record.text, recordIds: [record.id] };
}
