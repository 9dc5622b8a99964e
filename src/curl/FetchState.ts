import { CurlStateError } from "../utils/errors";

/**
 * Lifecycle of one fetch. Retries happen inside `Downloading`.
 */
export enum FetchState {
  Unfetched = "UNFETCHED",
  Cached = "CACHED",
  Downloading = "DOWNLOADING",
  Extracting = "EXTRACTING",
  Decoding = "DECODING",
  Ready = "READY",
  Failed = "FAILED",
}

const TRANSITIONS: Readonly<Record<FetchState, readonly FetchState[]>> = {
  [FetchState.Unfetched]: [FetchState.Cached, FetchState.Downloading, FetchState.Ready, FetchState.Failed],
  [FetchState.Cached]: [FetchState.Extracting, FetchState.Ready, FetchState.Failed],
  [FetchState.Downloading]: [FetchState.Extracting, FetchState.Ready, FetchState.Failed],
  [FetchState.Extracting]: [FetchState.Decoding, FetchState.Ready, FetchState.Failed],
  [FetchState.Decoding]: [FetchState.Ready, FetchState.Failed],
  [FetchState.Ready]: [],
  [FetchState.Failed]: [],
};

export function isTerminal(state: FetchState): boolean {
  return TRANSITIONS[state].length === 0;
}

/**
 * Validates a state change.
 * @throws {CurlStateError} If `to` does not follow `from`
 */
export function assertTransition(from: FetchState, to: FetchState): void {
  if (!TRANSITIONS[from].includes(to)) {
    throw new CurlStateError(`Invalid fetch state transition ${from} -> ${to}`);
  }
}
