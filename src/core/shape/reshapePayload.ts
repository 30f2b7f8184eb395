import { MalformedResponseError } from "../errors";

export type PayloadShape =
  | { kind: "passthrough" }
  | { kind: "flatten"; arrayField: string };

export const passthrough: PayloadShape = { kind: "passthrough" };

export const flatten = (arrayField: string): PayloadShape => ({ kind: "flatten", arrayField });

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Turns decoded report text into output segments.
 * `passthrough` keeps the text as one segment; `flatten` emits one JSON record per element of `arrayField`.
 */
export const reshapePayload = (text: string, shape: PayloadShape, source: string): string[] => {
  if (shape.kind === "passthrough") {
    const body = text.replace(/[\r\n]+$/, "");
    return body.trim() === "" ? [] : [body];
  }

  if (text.trim() === "") return [];

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new MalformedResponseError({
      message: `Report document is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      url: source,
      cause: err
    });
  }

  if (!isRecord(parsed)) {
    throw new MalformedResponseError({ message: "Report document is not a JSON object", url: source });
  }

  const items = parsed[shape.arrayField];
  if (items == null) return [];
  if (!Array.isArray(items)) {
    throw new MalformedResponseError({
      message: `Report field ${shape.arrayField} is not an array`,
      url: source
    });
  }

  return items.map((item) => JSON.stringify(item));
};

export const joinSegments = (segments: readonly string[]): string => segments.join("\n");

export const isBlankBody = (body: string): boolean => body.trim() === "";
