/**
 * @module diagnostics/error_codes
 *
 * 编译器所有诊断的稳定错误码与元数据。
 *
 * 错误码前缀对应错误类别：
 * - `L` 词法错误（LexicalError）
 * - `P` 语法错误（SyntaxError）
 * - `B` 绑定错误（BindingError）
 * - `I` 内部错误（InternalError，编译器缺陷）
 *
 * 工具链只应依赖 `code` 与 `kind` 两个字段，消息文本可能调整。
 */

export enum ErrorCode {
  INVALID_TOKEN = 'L001',
  UNTERMINATED_STRING = 'L002',
  UNTERMINATED_COMMENT = 'L003',
  INVALID_NUMBER = 'L004',
  INVALID_CHAR_LITERAL = 'L005',

  UNEXPECTED_TOKEN = 'P001',
  UNBALANCED_INTERPOLATION = 'P002',
  CASE_AFTER_DEFAULT = 'P003',
  UNKNOWN_DIRECTIVE = 'P004',

  UNRESOLVED_SYMBOL = 'B001',
  TYPE_MISMATCH = 'B002',
  NULL_SAFETY_VIOLATION = 'B003',
  AMBIGUOUS_OVERLOAD = 'B004',
  MISSING_OVERRIDE = 'B005',
  INVALID_TEST_LOCATION = 'B006',
  INVALID_SWITCH_ORDERING = 'B007',
  DUPLICATE_CASE_VALUE = 'B008',
  FEATURE_UNAVAILABLE = 'B009',
  DUPLICATE_DECLARATION = 'B010',
  IMPORT_COLLISION = 'B011',
  NO_APPLICABLE_OVERLOAD = 'B012',
  INVALID_ASSIGNMENT_TARGET = 'B013',
  IMMUTABLE_ASSIGNMENT = 'B014',
  CAPTURED_ASSIGNMENT = 'B015',
  INVALID_CONTROL_FLOW = 'B016',
  MISSING_RETURN = 'B017',
  INVALID_INHERITANCE = 'B018',
  INVALID_SUPER_CALL = 'B019',
  GENERIC_ARITY = 'B020',
  INVALID_STATIC_ACCESS = 'B021',

  INTERNAL_ERROR = 'I001',
}

export type ErrorCategory = 'lexical' | 'syntax' | 'binding' | 'internal';
export type ErrorSeverity = 'error' | 'warning' | 'info';

export interface ErrorMetadata {
  readonly kind: string;
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly message: string;
  readonly help?: string;
}

export const ERROR_METADATA: Readonly<Record<ErrorCode, ErrorMetadata>> = {
  [ErrorCode.INVALID_TOKEN]: {
    kind: 'InvalidToken',
    category: 'lexical',
    severity: 'error',
    message: "Invalid token '{text}'",
  },
  [ErrorCode.UNTERMINATED_STRING]: {
    kind: 'InvalidToken',
    category: 'lexical',
    severity: 'error',
    message: 'Unterminated string literal',
  },
  [ErrorCode.UNTERMINATED_COMMENT]: {
    kind: 'InvalidToken',
    category: 'lexical',
    severity: 'error',
    message: 'Unterminated block comment',
  },
  [ErrorCode.INVALID_NUMBER]: {
    kind: 'InvalidToken',
    category: 'lexical',
    severity: 'error',
    message: "Invalid numeric literal '{text}'",
  },
  [ErrorCode.INVALID_CHAR_LITERAL]: {
    kind: 'InvalidToken',
    category: 'lexical',
    severity: 'error',
    message: "Invalid character literal '{text}'",
    help: 'A character literal holds exactly one UTF-16 code unit.',
  },
  [ErrorCode.UNEXPECTED_TOKEN]: {
    kind: 'UnexpectedToken',
    category: 'syntax',
    severity: 'error',
    message: 'Expected {expected}, found {found}',
  },
  [ErrorCode.UNBALANCED_INTERPOLATION]: {
    kind: 'UnbalancedInterpolation',
    category: 'syntax',
    severity: 'error',
    message: "Unbalanced '${' in string interpolation",
  },
  [ErrorCode.CASE_AFTER_DEFAULT]: {
    kind: 'InvalidSwitchOrdering',
    category: 'syntax',
    severity: 'error',
    message: "'case' clause after 'default'",
    help: "'default' must be the last clause of a switch.",
  },
  [ErrorCode.UNKNOWN_DIRECTIVE]: {
    kind: 'UnexpectedToken',
    category: 'syntax',
    severity: 'error',
    message: "Unknown directive '#{name}'",
    help: 'Supported directives are #require and #requireNot.',
  },
  [ErrorCode.UNRESOLVED_SYMBOL]: {
    kind: 'UnresolvedSymbol',
    category: 'binding',
    severity: 'error',
    message: "Unresolved symbol '{name}'",
  },
  [ErrorCode.TYPE_MISMATCH]: {
    kind: 'TypeMismatch',
    category: 'binding',
    severity: 'error',
    message: 'Type mismatch: expected {expected}, found {actual}',
  },
  [ErrorCode.NULL_SAFETY_VIOLATION]: {
    kind: 'NullSafetyViolation',
    category: 'binding',
    severity: 'error',
    message: "Nullable value of type {actual} used where {expected} is required",
    help: "Guard with 'if (x != null)' or use '?.'.",
  },
  [ErrorCode.AMBIGUOUS_OVERLOAD]: {
    kind: 'AmbiguousOverload',
    category: 'binding',
    severity: 'error',
    message: "Ambiguous call to '{name}': candidates {candidates}",
  },
  [ErrorCode.MISSING_OVERRIDE]: {
    kind: 'MissingOverride',
    category: 'binding',
    severity: 'error',
    message: "Class '{class}' does not implement '{method}' from interface '{interface}'",
  },
  [ErrorCode.INVALID_TEST_LOCATION]: {
    kind: 'InvalidTestLocation',
    category: 'binding',
    severity: 'error',
    message: "Test '{name}' is declared outside the tests/ root",
  },
  [ErrorCode.INVALID_SWITCH_ORDERING]: {
    kind: 'InvalidSwitchOrdering',
    category: 'binding',
    severity: 'error',
    message: "'case' clause after 'default'",
  },
  [ErrorCode.DUPLICATE_CASE_VALUE]: {
    kind: 'DuplicateCaseValue',
    category: 'binding',
    severity: 'error',
    message: 'Duplicate case value {value}',
  },
  [ErrorCode.FEATURE_UNAVAILABLE]: {
    kind: 'FeatureUnavailable',
    category: 'binding',
    severity: 'error',
    message: "'{name}' requires feature '{feature}', which is not enabled for this unit",
  },
  [ErrorCode.DUPLICATE_DECLARATION]: {
    kind: 'DuplicateDeclaration',
    category: 'binding',
    severity: 'error',
    message: "Duplicate declaration of '{name}'",
  },
  [ErrorCode.IMPORT_COLLISION]: {
    kind: 'ImportCollision',
    category: 'binding',
    severity: 'error',
    message: "'{name}' is declared by both imported namespaces {first} and {second}",
  },
  [ErrorCode.NO_APPLICABLE_OVERLOAD]: {
    kind: 'TypeMismatch',
    category: 'binding',
    severity: 'error',
    message: "No overload of '{name}' accepts ({args})",
  },
  [ErrorCode.INVALID_ASSIGNMENT_TARGET]: {
    kind: 'TypeMismatch',
    category: 'binding',
    severity: 'error',
    message: 'Invalid assignment target',
  },
  [ErrorCode.IMMUTABLE_ASSIGNMENT]: {
    kind: 'TypeMismatch',
    category: 'binding',
    severity: 'error',
    message: "Cannot assign to immutable '{name}'",
  },
  [ErrorCode.CAPTURED_ASSIGNMENT]: {
    kind: 'TypeMismatch',
    category: 'binding',
    severity: 'error',
    message: "Cannot assign to captured variable '{name}' inside a lambda",
    help: 'Lambdas capture variables by value.',
  },
  [ErrorCode.INVALID_CONTROL_FLOW]: {
    kind: 'TypeMismatch',
    category: 'binding',
    severity: 'error',
    message: "'{keyword}' outside of a loop",
  },
  [ErrorCode.MISSING_RETURN]: {
    kind: 'TypeMismatch',
    category: 'binding',
    severity: 'error',
    message: "Function '{name}' must return a value of type {expected} on every path",
  },
  [ErrorCode.INVALID_INHERITANCE]: {
    kind: 'TypeMismatch',
    category: 'binding',
    severity: 'error',
    message: '{detail}',
  },
  [ErrorCode.INVALID_SUPER_CALL]: {
    kind: 'TypeMismatch',
    category: 'binding',
    severity: 'error',
    message: '{detail}',
  },
  [ErrorCode.GENERIC_ARITY]: {
    kind: 'TypeMismatch',
    category: 'binding',
    severity: 'error',
    message: "'{name}' expects {expected} type argument(s), found {actual}",
  },
  [ErrorCode.INVALID_STATIC_ACCESS]: {
    kind: 'UnresolvedSymbol',
    category: 'binding',
    severity: 'error',
    message: "'{name}' is not accessible from a {context} context",
  },
  [ErrorCode.INTERNAL_ERROR]: {
    kind: 'InternalError',
    category: 'internal',
    severity: 'error',
    message: 'Internal compiler error: {detail}',
  },
};

export function getErrorMetadata(code: ErrorCode): ErrorMetadata {
  return ERROR_METADATA[code];
}

/**
 * 用参数填充消息模板，未提供的占位符原样保留。
 */
export function formatErrorMessage(code: ErrorCode, params: Record<string, unknown> = {}): string {
  return ERROR_METADATA[code].message.replace(/\{(\w+)\}/g, (_, key: string) => {
    const value = params[key];
    if (value === undefined || value === null) return `{${key}}`;
    if (Array.isArray(value)) return value.join(', ');
    return String(value);
  });
}
