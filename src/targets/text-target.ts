/**
 * TextTarget - A named unit of text that tools can read and overwrite
 *
 * Two variants exist: file-backed (persistent) and buffer-backed
 * (in-memory, scoped to the process). View and edit operations are written
 * once against this interface.
 */

export type TextTargetKind = 'file' | 'buffer';

export interface TextTarget {
  readonly kind: TextTargetKind;
  /** Path or buffer name, used in messages returned to the agent */
  readonly name: string;
  read(): Promise<string>;
  /** Replaces the whole content, creating the target if it is missing */
  write(content: string): Promise<void>;
  exists(): Promise<boolean>;
}
