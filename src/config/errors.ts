/**
 * Manifest validation error types
 *
 * Provides structured error types for desired-state manifests with clear
 * messages and actionable suggestions.
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Validation error codes for manifest validation
 */
export type ManifestErrorCode =
  | 'MANIFEST_NOT_FOUND'
  | 'MANIFEST_PARSE_ERROR'
  | 'UNSUPPORTED_API_VERSION'
  | 'UNSUPPORTED_KIND'
  | 'MISSING_REQUIRED_FIELD'
  | 'INVALID_FIELD'
  | 'DUPLICATE_PARAMETER'
  | 'CONFLICTING_PARAMETER_VALUES';

// =============================================================================
// Validation Issue Types
// =============================================================================

/**
 * Severity level for validation issues
 */
export type ManifestIssueSeverity = 'error' | 'warning';

/**
 * A single validation issue
 */
export interface ManifestIssue {
  /** Error code for programmatic handling */
  code: ManifestErrorCode;
  /** Severity level */
  severity: ManifestIssueSeverity;
  /** Human-readable error message */
  message: string;
  /** Path to the problematic field (e.g., "parameters[2].applyMethod") */
  path: string;
  /** Suggestions for fixing the issue */
  suggestions?: string[];
}

// =============================================================================
// Manifest Error Class
// =============================================================================

/**
 * Error thrown when a manifest cannot be loaded or fails validation
 */
export class ManifestError extends Error {
  constructor(
    message: string,
    public readonly code: ManifestErrorCode,
    public readonly issues: ManifestIssue[] = [],
    public readonly sourcePath?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ManifestError';
  }

  /**
   * Error-level issues only
   */
  get errors(): ManifestIssue[] {
    return this.issues.filter((issue) => issue.severity === 'error');
  }

  /**
   * Format the validation errors for display
   */
  formatErrors(): string {
    const lines: string[] = [this.message];

    for (const issue of this.errors) {
      lines.push(`❌ [${issue.code}] ${issue.path}`);
      lines.push(`   ${issue.message}`);
      if (issue.suggestions?.length) {
        lines.push(`   Suggestions:`);
        for (const suggestion of issue.suggestions) {
          lines.push(`     • ${suggestion}`);
        }
      }
    }

    return lines.join('\n');
  }
}

// =============================================================================
// Issue Factories
// =============================================================================

export function missingRequiredField(path: string): ManifestIssue {
  return {
    code: 'MISSING_REQUIRED_FIELD',
    severity: 'error',
    message: `Required field "${path}" is missing or empty`,
    path,
  };
}

export function invalidField(path: string, message: string, suggestions?: string[]): ManifestIssue {
  return {
    code: 'INVALID_FIELD',
    severity: 'error',
    message,
    path,
    suggestions,
  };
}

export function duplicateParameter(path: string, name: string, firstPath: string): ManifestIssue {
  return {
    code: 'DUPLICATE_PARAMETER',
    severity: 'error',
    message: `Parameter "${name}" is declared twice with the same value (first at ${firstPath})`,
    path,
    suggestions: ['Remove one of the duplicate entries'],
  };
}

export function conflictingParameterValues(path: string, name: string, firstPath: string): ManifestIssue {
  return {
    code: 'CONFLICTING_PARAMETER_VALUES',
    severity: 'warning',
    message: `Parameter "${name}" is also declared at ${firstPath} with a different value; the remote keeps whichever is applied last`,
    path,
  };
}
