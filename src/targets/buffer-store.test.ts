import { describe, it, expect, beforeEach } from 'vitest';
import { BufferStore, BufferNotFoundError } from './buffer-store.js';

describe('BufferStore', () => {
  let store: BufferStore;

  beforeEach(() => {
    store = new BufferStore();
  });

  it('should open an empty buffer by default', () => {
    store.open('scratch');
    expect(store.get('scratch')).toBe('');
  });

  it('should keep existing content when reopened without content', () => {
    store.open('notes', 'keep me');
    store.open('notes');
    expect(store.get('notes')).toBe('keep me');
  });

  it('should replace content when reopened with content', () => {
    store.open('notes', 'first');
    store.open('notes', 'second');
    expect(store.get('notes')).toBe('second');
  });

  it('should throw BufferNotFoundError for unknown buffers', () => {
    expect(() => store.get('nope')).toThrow(BufferNotFoundError);
    expect(() => store.get('nope')).toThrow("No buffer named 'nope'");
  });

  it('should list buffers in creation order', () => {
    store.open('b');
    store.open('a');
    store.set('b', 'changed');
    store.set('c', 'new');
    expect(store.list()).toEqual(['b', 'a', 'c']);
  });

  it('should kill buffers', () => {
    store.open('doomed', 'x');
    expect(store.kill('doomed')).toBe(true);
    expect(store.has('doomed')).toBe(false);
    expect(store.kill('doomed')).toBe(false);
  });
});

describe('BufferTarget', () => {
  it('should read and write through the store', async () => {
    const store = new BufferStore();
    const target = store.target('notes');

    expect(target.kind).toBe('buffer');
    expect(target.name).toBe('notes');
    expect(await target.exists()).toBe(false);

    await target.write('content');

    expect(await target.exists()).toBe(true);
    expect(await target.read()).toBe('content');
    expect(store.get('notes')).toBe('content');
  });

  it('should reject reads of a missing buffer', async () => {
    const target = new BufferStore().target('missing');
    await expect(target.read()).rejects.toBeInstanceOf(BufferNotFoundError);
  });
});
