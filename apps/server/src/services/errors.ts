export type IssueKind =
  | 'UnknownProperty'
  | 'DuplicateProperty'
  | 'DuplicateGroup'
  | 'DuplicateRenderingRule'
  | 'UnknownWidget'
  | 'InvalidWidgetArgs'
  | 'SlugConflict'
  | 'DuplicateView'
  | 'InvalidBody';

export interface ConfigurationIssue {
  kind: IssueKind;
  message: string;
  keys?: string[];
}

export interface DuplicateGroupMembership {
  kind: 'DuplicateGroupMembership';
  key: string;
  groups: string[];
}

/** A configuration write was rejected; every violation found is listed in `issues`. */
export class ConfigurationError extends Error {
  readonly issues: ConfigurationIssue[];

  constructor(issues: ConfigurationIssue[]) {
    super(issues.map(issue => issue.message).join('; '));
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export class NotFoundError extends Error {
  constructor(resource: string, id: string) {
    super(`${resource} not found: ${id}`);
    this.name = 'NotFoundError';
  }
}
