/**
 * Security configuration types for docfilter
 *
 * This module defines the limits a translated filter can be checked against
 * before it is sent to the database, for filters built from untrusted input
 * such as query strings.
 */

/**
 * @interface ISecurityOptions
 * @description Limits enforced by FilterSecurityValidator
 *
 * @example
 * ```typescript
 * import { createDocFilter, type ISecurityOptions } from 'docfilter';
 *
 * const security: ISecurityOptions = {
 *   allowedFields: ['Name', 'Tags'],
 *   denyFields: ['PasswordHash'],
 *   maxQueryDepth: 5,
 *   maxClauseCount: 20
 * };
 *
 * const docFilter = createDocFilter({ model: personMap, security });
 * ```
 */
export interface ISecurityOptions {
  /**
   * Field paths that may be filtered on. A path also allows its sub-paths,
   * so `Tags` allows `Tags.red`. If empty, all fields are allowed.
   */
  allowedFields?: string[];

  /**
   * Field paths that may never be filtered on, together with their
   * sub-paths. These win over allowedFields.
   *
   * @example
   * ```typescript
   * denyFields: ['PasswordHash', 'Secrets']
   * ```
   */
  denyFields?: string[];

  /**
   * Map of field paths to values that may not be matched by equality or
   * `$in` on that field
   *
   * @example
   * ```typescript
   * denyValues: {
   *   Status: ['deleted'],
   *   'Profile.Role': ['system']
   * }
   * ```
   */
  denyValues?: Record<string, Array<string | number | boolean | null>>;

  /**
   * Maximum nesting depth of `$and`, `$or`, `$not` and `$elemMatch`
   *
   * @default 10
   */
  maxQueryDepth?: number;

  /**
   * Maximum number of field conditions in a filter
   *
   * @default 50
   */
  maxClauseCount?: number;

  /**
   * Maximum string length for values and regular expression patterns
   *
   * @default 1000
   */
  maxValueLength?: number;

  /**
   * Maximum number of values in an `$in` or `$nin` list
   *
   * @default 100
   */
  maxInListLength?: number;

  /**
   * Whether to reject regular expressions prone to catastrophic
   * backtracking, such as nested quantifiers or long chains of wildcards
   *
   * @default true
   */
  checkRegexComplexity?: boolean;
}

/**
 * Default security configuration values
 *
 * @example
 * ```typescript
 * import { DEFAULT_SECURITY_OPTIONS } from 'docfilter';
 *
 * const security = {
 *   ...DEFAULT_SECURITY_OPTIONS,
 *   maxClauseCount: 10
 * };
 * ```
 */
export const DEFAULT_SECURITY_OPTIONS: Required<ISecurityOptions> = {
  // Field restrictions
  allowedFields: [], // Empty means every field is allowed
  denyFields: [],
  denyValues: {},

  // Filter complexity limits
  maxQueryDepth: 10,
  maxClauseCount: 50,

  // Value limits
  maxValueLength: 1000,
  maxInListLength: 100,
  checkRegexComplexity: true
};
