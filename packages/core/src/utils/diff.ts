import { createTwoFilesPatch } from "diff";

export type DiffPreviewOptions = {
  context?: number;
  maxLines?: number;
};

const DEFAULT_CONTEXT = 2;
const DEFAULT_MAX_LINES = 40;

/**
 * Unified diff between the accepted and proposed text of one item,
 * truncated to `maxLines` with a trailing "..." marker.
 */
export function createDiffPreview(
  label: string,
  acceptedText: string,
  proposedText: string,
  options: DiffPreviewOptions = {}
) {
  const patch = createTwoFilesPatch(
    `${label} (accepted)`,
    `${label} (proposed)`,
    acceptedText,
    proposedText,
    undefined,
    undefined,
    { context: options.context ?? DEFAULT_CONTEXT }
  );

  // Drop the "====" separator line the patch starts with
  const lines = patch
    .trim()
    .split("\n")
    .filter((line) => !/^=+$/.test(line));
  const maxLines = options.maxLines ?? DEFAULT_MAX_LINES;
  const limited = lines.slice(0, maxLines);
  if (lines.length > maxLines) {
    limited.push("...");
  }

  return limited.join("\n");
}
