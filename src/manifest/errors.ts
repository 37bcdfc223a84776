/**
 * Manifest validation error types
 */

export type ManifestIssueCode =
  | 'MANIFEST_NOT_FOUND'
  | 'MANIFEST_UNPARSEABLE'
  | 'MISSING_REQUIRED_FIELD'
  | 'INVALID_FIELD'
  | 'UNKNOWN_FIELD'
  | 'SERVER_OWNED_KEY';

export type ManifestIssueSeverity = 'error' | 'warning';

/**
 * A single problem found in a manifest
 */
export interface ManifestIssue {
  code: ManifestIssueCode;
  severity: ManifestIssueSeverity;
  message: string;
  /** Field path, e.g. "config.limits.cpu" */
  path: string;
  suggestions?: string[];
}

/**
 * Thrown when a manifest cannot be turned into a desired spec
 */
export class ManifestValidationError extends Error {
  constructor(
    message: string,
    public readonly source: string,
    public readonly issues: ManifestIssue[]
  ) {
    super(message);
    this.name = 'ManifestValidationError';
  }

  get errors(): ManifestIssue[] {
    return this.issues.filter((issue) => issue.severity === 'error');
  }

  /**
   * Format the error-level issues for display
   */
  formatErrors(): string {
    const lines: string[] = [];

    for (const issue of this.errors) {
      lines.push(`[${issue.code}] ${issue.path || '(root)'}: ${issue.message}`);
      for (const suggestion of issue.suggestions ?? []) {
        lines.push(`    • ${suggestion}`);
      }
    }

    return lines.join('\n');
  }
}

// =============================================================================
// Issue Builders
// =============================================================================

export function missingField(path: string): ManifestIssue {
  return {
    code: 'MISSING_REQUIRED_FIELD',
    severity: 'error',
    message: `Required field "${path}" is missing`,
    path,
  };
}

export function invalidField(path: string, expected: string, suggestions?: string[]): ManifestIssue {
  return {
    code: 'INVALID_FIELD',
    severity: 'error',
    message: `Expected ${expected}`,
    path,
    ...(suggestions ? { suggestions } : {}),
  };
}

export function unknownField(path: string): ManifestIssue {
  return {
    code: 'UNKNOWN_FIELD',
    severity: 'warning',
    message: `Unknown field "${path}" is ignored`,
    path,
  };
}

export function serverOwnedKey(path: string): ManifestIssue {
  return {
    code: 'SERVER_OWNED_KEY',
    severity: 'warning',
    message: `Config key "${path}" is managed by LXD and is ignored`,
    path,
  };
}
