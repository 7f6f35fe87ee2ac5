import type { TextTarget } from '../targets/text-target.js';

/**
 * Outcome of a single-match replacement on a string
 */
export type ReplaceOutcome =
  | { status: 'replaced'; content: string }
  | { status: 'overwritten'; content: string }
  | { status: 'not_found' }
  | { status: 'ambiguous'; count: number };

/**
 * Options for viewing a line range
 */
export interface ViewOptions {
  /** Zero-based index of the first line (default: 0) */
  offset?: number;
  /** Maximum number of lines (default: the rest of the content) */
  limit?: number;
}

/**
 * Counts non-overlapping, case-sensitive literal occurrences of `needle`
 */
export function countOccurrences(haystack: string, needle: string): number {
  if (needle === '') {
    return 0;
  }

  let count = 0;
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    count++;
    index = haystack.indexOf(needle, index + needle.length);
  }
  return count;
}

/**
 * Replaces the single literal occurrence of `oldText` in `content`.
 *
 * An empty `oldText` means the whole content becomes `newText`. Any other
 * `oldText` must occur exactly once; otherwise nothing is replaced and the
 * outcome says why.
 */
export function replaceSingle(content: string, oldText: string, newText: string): ReplaceOutcome {
  if (oldText === '') {
    return { status: 'overwritten', content: newText };
  }

  const count = countOccurrences(content, oldText);
  if (count === 0) {
    return { status: 'not_found' };
  }
  if (count > 1) {
    return { status: 'ambiguous', count };
  }

  // Sliced rather than String#replace so `$&` and friends in newText stay literal
  const index = content.indexOf(oldText);
  return {
    status: 'replaced',
    content: content.slice(0, index) + newText + content.slice(index + oldText.length),
  };
}

/**
 * Edits a target in place, replacing exactly one occurrence of `oldText`.
 *
 * The target is written only when the edit applies. Absent and ambiguous
 * matches come back as error strings for the agent; read and write failures
 * propagate.
 */
export async function editTarget(target: TextTarget, oldText: string, newText: string): Promise<string> {
  // An empty oldText never looks at the current content, so the target may be missing
  const content = oldText === '' ? '' : await target.read();
  const outcome = replaceSingle(content, oldText, newText);

  switch (outcome.status) {
    case 'not_found':
      return `Error: old_string not found in ${target.name}`;
    case 'ambiguous':
      return `Error: old_string found ${outcome.count} times in ${target.name}; it must match exactly once`;
    case 'overwritten':
      await target.write(outcome.content);
      return `Successfully wrote ${target.name}`;
    case 'replaced':
      await target.write(outcome.content);
      return `Successfully edited ${target.name}`;
  }
}

/**
 * Overwrites the whole content of a target
 */
export async function replaceTarget(target: TextTarget, content: string): Promise<string> {
  await target.write(content);
  return `Successfully replaced content of ${target.name}`;
}

/**
 * Selects lines [offset, offset + limit) of a string split on '\n'
 */
export function sliceLines(content: string, options: ViewOptions = {}): string {
  if (options.offset === undefined && options.limit === undefined) {
    return content;
  }

  const offset = Math.max(0, options.offset ?? 0);
  const lines = content.split('\n');
  const end = options.limit === undefined ? lines.length : offset + Math.max(0, options.limit);

  return lines.slice(offset, end).join('\n');
}

/**
 * Reads a line range of a target
 */
export async function viewTarget(target: TextTarget, options: ViewOptions = {}): Promise<string> {
  return sliceLines(await target.read(), options);
}
