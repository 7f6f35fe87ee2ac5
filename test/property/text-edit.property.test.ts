import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { countOccurrences, replaceSingle, sliceLines, editTarget, replaceTarget, viewTarget } from '../../src/editing/text-edit.js';
import { BufferStore } from '../../src/targets/buffer-store.js';

/**
 * Property-based tests for single-match replacement and line views
 */
describe('Text Edit Property Tests', () => {
  // Small alphabet so generated needles collide with content often
  const text = fc.string({ unit: fc.constantFrom('a', 'b', 'c', '\n', '$'), maxLength: 40 });
  const needle = fc.string({ unit: fc.constantFrom('a', 'b', 'c', '\n', '$'), minLength: 1, maxLength: 4 });

  describe('Property: exactly-once matches are replaced and nothing else changes', () => {
    it('replaces the unique occurrence in place', () => {
      fc.assert(
        fc.property(text, text, needle, fc.string(), (before, after, oldText, newText) => {
          const content = before + oldText + after;
          // The inserted copy must be the one the scan finds
          fc.pre(countOccurrences(content, oldText) === 1 && content.indexOf(oldText) === before.length);

          const outcome = replaceSingle(content, oldText, newText);
          expect(outcome).toEqual({ status: 'replaced', content: before + newText + after });
        }),
        { numRuns: 200 }
      );
    });
  });

  describe('Property: absent or repeated matches never mutate', () => {
    it('reports not_found or ambiguous with the exact count', async () => {
      await fc.assert(
        fc.asyncProperty(text, needle, fc.string(), async (content, oldText, newText) => {
          const count = countOccurrences(content, oldText);
          fc.pre(count !== 1);

          const store = new BufferStore();
          const target = store.open('buf', content);
          const message = await editTarget(target, oldText, newText);

          expect(store.get('buf')).toBe(content);
          expect(message).toBe(
            count === 0
              ? 'Error: old_string not found in buf'
              : `Error: old_string found ${count} times in buf; it must match exactly once`
          );
        }),
        { numRuns: 200 }
      );
    });
  });

  describe('Property: full replace then read returns the new content', () => {
    it('round-trips any content, including the empty string', async () => {
      await fc.assert(
        fc.asyncProperty(fc.string(), fc.string(), async (initial, replacement) => {
          const store = new BufferStore();
          const target = store.open('buf', initial);

          await replaceTarget(target, replacement);

          expect(await target.read()).toBe(replacement);
        }),
        { numRuns: 100 }
      );
    });
  });

  describe('Property: views select lines [offset, offset + limit)', () => {
    const lines = fc.array(fc.string({ unit: fc.constantFrom('x', 'y', ' '), maxLength: 5 }), { minLength: 1, maxLength: 15 });

    it('matches slicing the line array', () => {
      fc.assert(
        fc.property(lines, fc.nat(20), fc.nat(20), (parts, offset, limit) => {
          const content = parts.join('\n');
          expect(sliceLines(content, { offset, limit })).toBe(parts.slice(offset, offset + limit).join('\n'));
        }),
        { numRuns: 200 }
      );
    });

    it('returns the whole content without options', async () => {
      await fc.assert(
        fc.asyncProperty(fc.string(), async (content) => {
          const target = new BufferStore().open('buf', content);
          expect(await viewTarget(target)).toBe(content);
        }),
        { numRuns: 100 }
      );
    });
  });
});
