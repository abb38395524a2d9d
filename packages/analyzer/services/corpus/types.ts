// Feedback corpus types
import { z } from "zod";

export const FEEDBACK_SOURCES = ["Support Ticket", "App Store Review", "Survey", "Twitter Mention"] as const;
export const FEEDBACK_SENTIMENTS = ["Positive", "Negative", "Neutral"] as const;

export type FeedbackSource = (typeof FEEDBACK_SOURCES)[number];
export type FeedbackSentiment = (typeof FEEDBACK_SENTIMENTS)[number];

// One CSV row as written by the corpus generator
export const FeedbackRowSchema = z.object({
  feedback_id: z.string().trim().min(1),
  source: z.enum(FEEDBACK_SOURCES),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "date must be YYYY-MM-DD"),
  user_id: z.string().trim().default(""),
  feedback_text: z.string().trim().max(5000),
  sentiment: z.enum(FEEDBACK_SENTIMENTS),
});

export type FeedbackRow = z.infer<typeof FeedbackRowSchema>;

export type FeedbackRecord = Readonly<{
  id: string;
  source: FeedbackSource;
  date: string;
  userId: string;
  text: string;
  sentiment: FeedbackSentiment;
}>;

export type CorpusLoadResult = {
  records: readonly FeedbackRecord[];
  /** Rows dropped for empty text or failed validation */
  skipped: { row: number; reason: string }[];
};

export type DatasetStatus = "Loaded" | "Disconnected";

export type DatasetInfo = {
  filename: string;
  recordCount: number;
  lastUpdated: string;
  fileSize: string;
  status: DatasetStatus;
};
