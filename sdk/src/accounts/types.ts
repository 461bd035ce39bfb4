export interface ExternalAuth {
  /** Platform key, e.g. `psn`, `xbl`, `nintendo` */
  type: string;
  displayName?: string;
  accountId?: string;
}

export interface Account {
  id: string;
  /** Absent for accounts that never set a display name */
  displayName?: string;
  externalAuths: Record<string, ExternalAuth>;
}
