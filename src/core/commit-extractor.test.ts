import { describe, it, expect } from 'vitest';
import { extractCommits, UNKNOWN_REPOSITORY } from './commit-extractor.js';
import { formatTimestamp } from './timestamp.js';
import {
  createTestCommit,
  createTestConfig,
  createTestReleaseEvent,
  createTestReleaseEventWithChanges,
  fixedClock,
} from '../testing/factories.js';

const clock = fixedClock('2024-03-04T05:06:07.890Z');

describe('extractCommits', () => {
  it('maps one feature and one fix in category order', () => {
    const config = createTestConfig({ commits: { repository: 'acme/api' } });

    expect(extractCommits(config, createTestReleaseEventWithChanges(), clock)).toEqual([
      {
        id: 'feat111',
        repository: 'acme/api',
        message: 'feat: new feature',
        timestamp: '2024-03-04T05:06:07Z',
      },
      {
        id: 'fix2222',
        repository: 'acme/api',
        message: 'fix: bug fix',
        timestamp: '2024-03-04T05:06:07Z',
      },
    ]);
  });

  it('orders features, fixes, breaking, other regardless of input order', () => {
    const event = createTestReleaseEvent({
      changes: {
        other: [createTestCommit({ hash: 'o1' })],
        breaking: [createTestCommit({ hash: 'b1' }), createTestCommit({ hash: 'b2' })],
        fixes: [createTestCommit({ hash: 'x1' })],
        features: [createTestCommit({ hash: 'f1' })],
      },
    });

    const ids = extractCommits(createTestConfig(), event, clock).map((c) => c.id);
    expect(ids).toEqual(['f1', 'x1', 'b1', 'b2', 'o1']);
  });

  it('uses "unknown" when no repository is configured', () => {
    const records = extractCommits(createTestConfig(), createTestReleaseEventWithChanges(), clock);
    expect(records.every((r) => r.repository === UNKNOWN_REPOSITORY)).toBe(true);
    expect(UNKNOWN_REPOSITORY).toBe('unknown');
  });

  it('copies author fields when present', () => {
    const event = createTestReleaseEvent({
      changes: {
        features: [
          createTestCommit({ hash: 'a', author: { name: 'Dev One', email: 'dev@example.com' } }),
          createTestCommit({ hash: 'b', author: { name: 'Dev Two' } }),
        ],
        fixes: [],
        breaking: [],
        other: [],
      },
    });

    const [first, second] = extractCommits(createTestConfig(), event, clock);
    expect(first.author_name).toBe('Dev One');
    expect(first.author_email).toBe('dev@example.com');
    expect(second.author_name).toBe('Dev Two');
    expect(second).not.toHaveProperty('author_email');
  });

  it('returns an empty list without changes', () => {
    expect(extractCommits(createTestConfig(), createTestReleaseEvent(), clock)).toEqual([]);
  });

  it('returns an empty list for a null change set', () => {
    const event = createTestReleaseEvent({ changes: null });
    expect(extractCommits(createTestConfig(), event, clock)).toEqual([]);
  });

  it('skips categories the host left out', () => {
    const event = createTestReleaseEvent({
      changes: { fixes: [createTestCommit({ hash: 'x1' })] },
    });

    expect(extractCommits(createTestConfig(), event, clock).map((c) => c.id)).toEqual(['x1']);
  });

  it('returns an empty list for empty categories', () => {
    const event = createTestReleaseEvent({
      changes: { features: [], fixes: [], breaking: [], other: [] },
    });
    expect(extractCommits(createTestConfig(), event, clock)).toEqual([]);
  });
});

describe('formatTimestamp', () => {
  it('drops milliseconds', () => {
    expect(formatTimestamp(new Date('2024-01-01T00:00:00.123Z'))).toBe('2024-01-01T00:00:00Z');
  });
});
