import { describe, it, expect } from 'vitest';
import { FileResultStore } from '../../src/services/resultStore';
import { memoryFileSystem } from '../fakes/memoryFileSystem';

describe('FileResultStore', () => {
  const now = () => new Date(2026, 2, 4, 14, 5);

  it('starts the log with the title header', async () => {
    const { files, fs } = memoryFileSystem();
    const store = new FileResultStore(fs, '/out/standup_full_transcript.txt', now);

    await store.open('standup');

    expect(files.get('/out/standup_full_transcript.txt'))
      .toBe(`FULL TRANSCRIPT - standup\nGenerated: March 04, 2026 at 02:05 PM\n${'='.repeat(80)}\n\n`);
  });

  it('appends blocks in order after the header', async () => {
    const { files, fs } = memoryFileSystem();
    const store = new FileResultStore(fs, '/out/log.txt', now);

    await store.open('log');
    await store.append('first\n');
    await store.append('second\n');

    expect(files.get('/out/log.txt')?.endsWith('\n\nfirst\nsecond\n')).toBe(true);
    expect(fs.appendFile).toHaveBeenCalledTimes(2);
  });

  it('replaces a previous log when reopened', async () => {
    const { files, fs } = memoryFileSystem({ '/out/log.txt': 'stale content' });
    const store = new FileResultStore(fs, '/out/log.txt', now);

    await store.open('log');

    expect(files.get('/out/log.txt')?.startsWith('FULL TRANSCRIPT - log\n')).toBe(true);
    expect(files.get('/out/log.txt')).not.toContain('stale content');
  });
});
