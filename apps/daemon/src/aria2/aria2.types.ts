export type Aria2Status =
  | 'active'
  | 'waiting'
  | 'paused'
  | 'error'
  | 'complete'
  | 'removed';

export type Aria2Download = {
  gid: string;
  name: string;
  status: Aria2Status;
  isComplete: boolean;
  /** Output paths on disk; entries aria2 has not resolved yet are left out. */
  files: string[];
};

export type RemoveOptions = {
  /** Also delete the download's files from disk. */
  deleteFiles?: boolean;
  /** Drop the stopped result from aria2's memory. Defaults to true. */
  clean?: boolean;
};

export type CompletionListener = {
  isAlive(): boolean;
  close(): void;
};

export type CompletionHandler = (gid: string) => void;

/** Raw `tellStatus` shape, as far as this daemon reads it. */
export type Aria2RawStatus = {
  gid?: unknown;
  status?: unknown;
  files?: unknown;
  bittorrent?: unknown;
};
