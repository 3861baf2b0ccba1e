/**
 * Navigation Rules Types
 *
 * Domain model shared by the resolver, the rule sources, the repository and
 * the API layer.
 */

// ============================================================================
// RULES
// ============================================================================

/**
 * A single navigation rule: when the view `fromLocation` produces the outcome
 * `condition`, navigate to `toLocation`.
 */
export interface NavigationRule {
  readonly fromLocation: string;
  readonly toLocation: string;
  readonly condition: string;
}

export interface PersistedNavigationRule extends NavigationRule {
  readonly id: number;
  readonly createdAt: Date;
}

/** Row shape of the navigation_rules table. */
export interface NavigationRuleRow {
  id: number;
  from_view_id: string;
  to_view_id: string;
  condition: string;
  created_at: Date;
}

// ============================================================================
// RESOLUTION
// ============================================================================

export interface ResolutionRequest {
  readonly fromLocation: string;
  readonly actionToken?: string;
  readonly outcome: string;
}

export type ResolutionResult =
  | { readonly status: 'resolved'; readonly toLocation: string; readonly source: string }
  | { readonly status: 'unresolved' };

export const UNRESOLVED: ResolutionResult = { status: 'unresolved' };

// ============================================================================
// SERVICE RESULTS
// ============================================================================

export type ServiceResult<T> =
  | { success: true; data: T }
  | { success: false; error: ServiceError };

export interface ServiceError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

export const ErrorCodes = {
  NOT_FOUND: 'NOT_FOUND',
  INVALID_INPUT: 'INVALID_INPUT',
  DATABASE_ERROR: 'DATABASE_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
