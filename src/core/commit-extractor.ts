/**
 * Maps the conventional commits of a release event to the commit
 * records sent to the tracker.
 *
 * Order: features, fixes, breaking, other; within a category the
 * host's order. Every record is stamped with the extraction time, not
 * the commit's own time.
 */

import type { PluginConfig } from '../types/config.js';
import { CHANGE_CATEGORIES, type ReleaseEvent } from '../types/release.js';
import type { CommitRecord } from './tracker/tracker-client.js';
import { formatTimestamp, systemClock, type Clock } from './timestamp.js';

/** Repository identifier used when none is configured. */
export const UNKNOWN_REPOSITORY = 'unknown';

export function extractCommits(
  config: Pick<PluginConfig, 'commits'>,
  event: ReleaseEvent,
  clock: Clock = systemClock,
): CommitRecord[] {
  const changes = event.changes;
  if (changes == null) {
    return [];
  }

  const repository = config.commits.repository || UNKNOWN_REPOSITORY;
  const timestamp = formatTimestamp(clock());

  return CHANGE_CATEGORIES.flatMap((category) => changes[category] ?? []).map((commit) => {
    const record: CommitRecord = {
      id: commit.hash,
      repository,
      message: commit.description,
      timestamp,
    };
    if (commit.author?.name) record.author_name = commit.author.name;
    if (commit.author?.email) record.author_email = commit.author.email;
    return record;
  });
}
