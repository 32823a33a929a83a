import { Double, Int32, Long, ObjectId } from 'bson';
import { fieldPath, isFieldOperation } from '../ast/factory';
import { AstFilter, IAstFilterField } from '../ast/types';
import { BsonValue, isBsonDocument } from '../serialization/bson-value';
import { DEFAULT_SECURITY_OPTIONS, ISecurityOptions } from './types';

/**
 * Error thrown when a filter violates security constraints
 *
 * @example
 * ```typescript
 * try {
 *   validator.validate(filter);
 * } catch (error) {
 *   if (error instanceof FilterSecurityError) {
 *     res.status(400).json({ error: error.message });
 *   }
 * }
 * ```
 */
export class FilterSecurityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FilterSecurityError';
  }
}

// Nested quantifiers such as (a+)+ or (.*)*
const NESTED_QUANTIFIER = /\([^)]*[*+][^)]*\)\s*[*+{]/;
// Alternating wildcards such as .*a.*b.*c.*d.*e
const ALTERNATING_WILDCARDS = /(\.[*+][^.]+){5,}/;
const MAX_REGEX_WILDCARDS = 10;

/**
 * Validates translated filters against security constraints
 *
 * Field paths are checked as they appear in the rendered filter: a condition
 * inside `$elemMatch` on `Items` with the relative path `Price` is checked as
 * `Items.Price`. The filter is never modified.
 *
 * @example
 * ```typescript
 * const validator = new FilterSecurityValidator({
 *   denyFields: ['PasswordHash'],
 *   maxQueryDepth: 5
 * });
 *
 * const filter = translator.translate(predicate);
 * validator.validate(filter);
 * ```
 */
export class FilterSecurityValidator {
  private options: Required<ISecurityOptions>;

  /**
   * @param options - Security options to apply. If not provided, default options will be used.
   */
  constructor(options: ISecurityOptions = {}) {
    this.options = {
      ...DEFAULT_SECURITY_OPTIONS,
      ...options
    };
  }

  /**
   * Validate a filter against security constraints
   *
   * @throws {FilterSecurityError} If the filter violates any constraint
   */
  public validate(filter: AstFilter): void {
    this.validateFields(filter);
    this.validateQueryDepth(filter, 0);
    this.validateClauseCount(filter);
    this.validateValues(filter, [], true);
  }

  private validateFields(filter: AstFilter): void {
    const fieldSet = new Set<string>();
    this.collectFields(filter, [], fieldSet);

    for (const field of fieldSet) {
      const denied = this.options.denyFields.some(denyField => coversPath(denyField, field));
      const allowed =
        this.options.allowedFields.length === 0 ||
        this.options.allowedFields.some(allowedField => coversPath(allowedField, field));

      // Generic message to prevent field enumeration
      if (denied || !allowed) {
        throw new FilterSecurityError('Invalid query parameters');
      }
    }
  }

  private validateQueryDepth(filter: AstFilter, currentDepth: number): void {
    if (currentDepth > this.options.maxQueryDepth) {
      throw new FilterSecurityError(
        `Query exceeds maximum depth of ${this.options.maxQueryDepth}`
      );
    }

    for (const child of childFilters(filter)) {
      this.validateQueryDepth(child, currentDepth + 1);
    }
  }

  private validateClauseCount(filter: AstFilter): void {
    const count = this.countClauses(filter);
    if (count > this.options.maxClauseCount) {
      throw new FilterSecurityError(
        `Query exceeds maximum clause count of ${this.options.maxClauseCount} (found ${count})`
      );
    }
  }

  /**
   * Count the field conditions in a filter; an `$elemMatch` counts as the
   * conditions inside it
   */
  private countClauses(filter: AstFilter): number {
    const children = childFilters(filter);
    if (children.length === 0) {
      return isFieldOperation(filter) ? 1 : 0;
    }
    return children.reduce((count, child) => count + this.countClauses(child), 0);
  }

  /**
   * Denied values are checked on equality and `$in` conditions that are not
   * negated; `!(x.Role == 'admin')` excludes the value instead of asking for it
   */
  private validateValues(filter: AstFilter, scope: readonly string[], positive: boolean): void {
    switch (filter.type) {
      case 'comparison':
        this.validateValue(filter.value);
        if (positive && filter.operator === '$eq') {
          this.validateDeniedValues(filter.field, scope, [filter.value]);
        }
        return;
      case 'in':
        if (filter.values.length > this.options.maxInListLength) {
          throw new FilterSecurityError(
            `Array values cannot exceed ${this.options.maxInListLength} items`
          );
        }
        filter.values.forEach(value => this.validateValue(value));
        if (positive) {
          this.validateDeniedValues(filter.field, scope, filter.values);
        }
        return;
      case 'regex':
        this.validateStringLength(filter.pattern);
        if (this.options.checkRegexComplexity) {
          this.validateRegexComplexity(filter.pattern);
        }
        return;
      case 'elemMatch':
        this.validateValues(filter.filter, [...scope, ...filter.field.path], positive);
        return;
      case 'not':
        this.validateValues(filter.filter, scope, !positive);
        return;
      default:
        for (const child of childFilters(filter)) {
          this.validateValues(child, scope, positive);
        }
    }
  }

  private validateValue(value: BsonValue): void {
    if (typeof value === 'string') {
      this.validateStringLength(value);
    } else if (Array.isArray(value)) {
      value.forEach(item => this.validateValue(item));
    } else if (isBsonDocument(value)) {
      Object.values(value).forEach(item => this.validateValue(item));
    }
  }

  private validateStringLength(value: string): void {
    if (value.length > this.options.maxValueLength) {
      throw new FilterSecurityError(
        `Query contains a string value that exceeds maximum length of ${this.options.maxValueLength} characters`
      );
    }
  }

  private validateDeniedValues(
    field: IAstFilterField,
    scope: readonly string[],
    values: readonly BsonValue[]
  ): void {
    const deniedValues = this.options.denyValues[[...scope, ...field.path].join('.')];
    if (!deniedValues) {
      return;
    }
    for (const value of values) {
      const comparable = comparableValue(value);
      if (deniedValues.some(denied => denied === comparable)) {
        throw new FilterSecurityError('Invalid query parameters');
      }
    }
  }

  private validateRegexComplexity(pattern: string): void {
    const wildcardCount = (pattern.match(/\.[*+]/g) || []).length;
    if (wildcardCount > MAX_REGEX_WILDCARDS) {
      throw new FilterSecurityError('Excessive wildcard usage');
    }

    if (NESTED_QUANTIFIER.test(pattern) || ALTERNATING_WILDCARDS.test(pattern)) {
      throw new FilterSecurityError('Complex regular expressions not allowed');
    }
  }

  /**
   * Collect the full path of every field a filter references
   */
  private collectFields(filter: AstFilter, scope: readonly string[], fieldSet: Set<string>): void {
    if (isFieldOperation(filter)) {
      const path = fieldPath({ kind: 'field', path: [...scope, ...filter.field.path] });
      if (path) {
        fieldSet.add(path);
      }
      if (filter.type === 'elemMatch') {
        this.collectFields(filter.filter, [...scope, ...filter.field.path], fieldSet);
      }
      return;
    }

    for (const child of childFilters(filter)) {
      this.collectFields(child, scope, fieldSet);
    }
  }
}

/**
 * Serialized numbers and object ids as the primitives a deny rule lists
 */
function comparableValue(value: BsonValue): BsonValue {
  if (value instanceof Double || value instanceof Int32) {
    return value.value;
  }
  if (value instanceof Long) {
    return value.toNumber();
  }
  if (value instanceof ObjectId) {
    return value.toHexString();
  }
  return value;
}

function childFilters(filter: AstFilter): readonly AstFilter[] {
  switch (filter.type) {
    case 'and':
    case 'or':
      return filter.filters;
    case 'not':
    case 'elemMatch':
      return [filter.filter];
    default:
      return [];
  }
}

/**
 * True when `path` is `rule` or one of its sub-paths
 */
function coversPath(rule: string, path: string): boolean {
  return path === rule || path.startsWith(`${rule}.`);
}
