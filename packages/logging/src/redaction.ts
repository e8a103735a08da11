const DEFAULT_SENSITIVE_SUBSTRINGS = [
  'token',
  'secret',
  'authorization',
  'cookie',
  'password',
  'verifier',
  'bearer',
  'stdin',
  'content'
] as const;

const REDACTED_VALUE = '[REDACTED]';
const MAX_RECURSION_DEPTH = 12;

const normalizeKey = (value: string) => value.trim().toLowerCase().replace(/[^a-z0-9_]/gu, '');

const isSensitiveKey = ({key, extraSensitiveKeys}: {key: string; extraSensitiveKeys: Set<string>}) => {
  const normalized = normalizeKey(key);
  if (extraSensitiveKeys.has(normalized)) {
    return true;
  }

  return DEFAULT_SENSITIVE_SUBSTRINGS.some(entry => normalized.includes(entry));
};

const sanitizeInternal = ({
  value,
  depth,
  seen,
  extraSensitiveKeys
}: {
  value: unknown;
  depth: number;
  seen: WeakSet<object>;
  extraSensitiveKeys: Set<string>;
}): unknown => {
  if (depth > MAX_RECURSION_DEPTH) {
    return '[TRUNCATED]';
  }

  if (value === null || value === undefined) {
    return value;
  }

  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
      return value;
    case 'bigint':
      return value.toString();
    case 'symbol':
      return value.toString();
    case 'function':
      return '[FUNCTION]';
    default:
      break;
  }

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? '[INVALID_DATE]' : value.toISOString();
  }

  if (value instanceof Error) {
    return {
      name: value.name,
      message: value.message,
      ...(value.stack ? {stack: value.stack} : {})
    };
  }

  if (typeof value !== 'object') {
    return Object.prototype.toString.call(value);
  }

  if (seen.has(value)) {
    return '[CIRCULAR]';
  }
  seen.add(value);

  if (Array.isArray(value)) {
    return value.map(item => sanitizeInternal({value: item, depth: depth + 1, seen, extraSensitiveKeys}));
  }

  return Object.fromEntries(
    Object.entries(value).map(([key, entryValue]) =>
      isSensitiveKey({key, extraSensitiveKeys})
        ? [key, REDACTED_VALUE]
        : [key, sanitizeInternal({value: entryValue, depth: depth + 1, seen, extraSensitiveKeys})]
    )
  );
};

export const sanitizeForLog = ({
  value,
  extraSensitiveKeys = []
}: {
  value: unknown;
  extraSensitiveKeys?: string[];
}): unknown => {
  const normalizedExtraKeys = new Set(
    extraSensitiveKeys.map(item => normalizeKey(item)).filter(item => item.length > 0)
  );

  return sanitizeInternal({
    value,
    depth: 0,
    seen: new WeakSet<object>(),
    extraSensitiveKeys: normalizedExtraKeys
  });
};
