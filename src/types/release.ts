/**
 * Release event types supplied by the host.
 *
 * A release event describes one completed release: its version, tag,
 * commit and the conventional commits grouped by category.
 */

// ---------------------------------------------------------------------------
// Conventional commits
// ---------------------------------------------------------------------------

export interface CommitAuthor {
  name?: string;
  email?: string;
}

/** A commit parsed as a conventional commit by the host. */
export interface ConventionalCommit {
  hash: string;
  description: string;
  type?: string;
  scope?: string;
  author?: CommitAuthor;
}

/** Commits of a release grouped by category. Hosts may omit empty categories. */
export interface ChangeSet {
  features?: ConventionalCommit[];
  fixes?: ConventionalCommit[];
  breaking?: ConventionalCommit[];
  other?: ConventionalCommit[];
}

// ---------------------------------------------------------------------------
// ReleaseEvent
// ---------------------------------------------------------------------------

export interface ReleaseEvent {
  version: string;
  tagName: string;
  commitSha: string;
  branch: string;
  /** Absent or null when the host computed no change set. */
  changes?: ChangeSet | null;
}

/** Category order used when flattening a ChangeSet. */
export const CHANGE_CATEGORIES = ['features', 'fixes', 'breaking', 'other'] as const;

export type ChangeCategory = (typeof CHANGE_CATEGORIES)[number];
