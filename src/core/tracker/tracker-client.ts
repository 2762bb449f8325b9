/**
 * Tracker client contract and the remote record types it exchanges.
 *
 * The orchestrator only talks to this interface. `SentryClient` is the
 * HTTP implementation; tests use `FakeTrackerClient`.
 *
 * Every operation takes an optional AbortSignal; an aborted call
 * rejects with TransportError.
 */

// ---------------------------------------------------------------------------
// Remote records
// ---------------------------------------------------------------------------

export interface RemoteProject {
  id: string;
  name: string;
  slug: string;
}

export interface RemoteRelease {
  version: string;
  shortVersion?: string;
  ref?: string;
  url?: string;
  dateCreated?: string;
  dateReleased?: string | null;
  projects?: RemoteProject[];
}

export interface RemoteDeploy {
  id: string;
  environment: string;
  name?: string;
  dateStarted?: string;
  dateFinished?: string;
}

export interface Organization {
  id: string;
  slug: string;
  name: string;
}

/** A commit as sent to the set-commits endpoint. */
export interface CommitRecord {
  id: string;
  repository: string;
  message?: string;
  author_name?: string;
  author_email?: string;
  timestamp?: string;
}

// ---------------------------------------------------------------------------
// Request bodies
// ---------------------------------------------------------------------------

export interface CreateReleaseInput {
  version: string;
  projects: string[];
  ref?: string;
  url?: string;
  dateStarted: string;
}

export interface CreateDeployInput {
  environment: string;
  name?: string;
  dateStarted: string;
  dateFinished: string;
}

// ---------------------------------------------------------------------------
// TrackerClient
// ---------------------------------------------------------------------------

export interface TrackerClient {
  getOrganization(signal?: AbortSignal): Promise<Organization>;
  createRelease(input: CreateReleaseInput, signal?: AbortSignal): Promise<RemoteRelease>;
  getRelease(version: string, signal?: AbortSignal): Promise<RemoteRelease>;
  setCommits(version: string, commits: CommitRecord[], signal?: AbortSignal): Promise<void>;
  createDeploy(
    version: string,
    input: CreateDeployInput,
    signal?: AbortSignal,
  ): Promise<RemoteDeploy>;
  finalizeRelease(version: string, dateReleased: string, signal?: AbortSignal): Promise<void>;
}

/** Connection settings a client is built from. */
export interface TrackerConnection {
  url: string;
  authToken: string;
  org: string;
}

export type TrackerClientFactory = (connection: TrackerConnection) => TrackerClient;
