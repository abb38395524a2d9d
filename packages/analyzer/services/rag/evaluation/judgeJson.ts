// JSON extraction for judge completions
import type { z } from "zod";

/**
 * Parse the JSON object in a completion. Models sometimes wrap it in a code fence
 * or add a sentence around it, so only the outermost braces are read.
 */
export function extractJsonObject(text: string): unknown {
  const unfenced = text.replace(/```(?:json)?/gi, "");
  const start = unfenced.indexOf("{");
  const end = unfenced.lastIndexOf("}");
  if (start === -1 || end <= start) {
    throw new Error("no JSON object in model output");
  }
  return JSON.parse(unfenced.slice(start, end + 1));
}

export function parseJudgeOutput<T extends z.ZodTypeAny>(schema: T, text: string): z.infer<T> {
  const result = schema.safeParse(extractJsonObject(text));
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(`unexpected judge output at ${issue.path.join(".") || "root"}: ${issue.message}`);
  }
  return result.data;
}
