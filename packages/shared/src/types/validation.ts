export type IssueSeverity = 'error' | 'warning' | 'information';

export type IssueCode = 'required' | 'reference' | 'coding' | 'structure' | 'remote';

export interface ValidationIssue {
  severity: IssueSeverity;
  code: IssueCode;
  source: 'local' | 'remote';
  /** Index into the bundle entries; absent for bundle-level issues. */
  entryIndex?: number;
  path: string;
  message: string;
}

export type RemoteValidationStatus = 'valid' | 'invalid' | 'unknown' | 'skipped';

export interface EntryRepair {
  entryIndex: number;
  internalId: string;
  recordType: string;
  trigger: 'local' | 'remote';
  /** True when the reduced record still fails the required-field check. */
  unresolved: boolean;
  droppedReferences: string[];
}

export interface ValidationReport {
  valid: boolean;
  localStatus: 'valid' | 'invalid';
  remoteStatus: RemoteValidationStatus;
  remoteReason?: string;
  issues: ValidationIssue[];
  repairs: EntryRepair[];
  unresolvedEntries: number[];
}
