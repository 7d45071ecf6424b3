import { describe, it, expect } from 'vitest';
import {
  formatAgent,
  formatList,
  formatLock,
  formatMemory,
  formatMessage,
  getStatusIcon
} from '../src/utils/format.js';

describe('format', () => {
  it('picks an icon per status', () => {
    expect(getStatusIcon('active')).toBe('🟢');
    expect(getStatusIcon('blocked')).toBe('🔴');
    expect(getStatusIcon('reviewing')).toBe('⚪');
  });

  it('omits empty agent details', () => {
    expect(formatAgent({ name: 'worker', status: 'idle', registeredAt: 0, lastSeen: 0 }))
      .toBe('⚪ worker: idle [last seen 1970-01-01T00:00:00.000Z]');
  });

  it('indents every body line of a read message', () => {
    expect(formatMessage({
      id: 3, sender: 'coordinator', recipient: 'worker', subject: '[DONE] build x',
      body: 'line one\nline two', createdAt: 0, read: true, acknowledged: false
    })).toEqual([
      '  #3 from coordinator: [DONE] build x',
      '    line one',
      '    line two'
    ]);
  });

  it('shows remaining time on active locks', () => {
    expect(formatLock({
      path: 'src/app.ts', agent: 'worker', acquiredAt: 0, expiresAt: 90_000,
      expired: false, remainingSeconds: 90
    })).toBe('🔒 src/app.ts held by worker (90s remaining)');
  });

  it('lists untagged memories without brackets', () => {
    expect(formatMemory({ id: 'abc123abc123', content: 'note', tags: [], createdAt: 0 }))
      .toBe('abc123abc123  note');
  });

  it('flattens multi-line items and falls back when empty', () => {
    expect(formatList([1, 2], 'none', n => [`${n}`, `${n}!`])).toEqual(['1', '1!', '2', '2!']);
    expect(formatList([], 'none', String)).toEqual(['none']);
  });
});
