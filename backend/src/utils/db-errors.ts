export type ConstraintKind = 'unique' | 'foreign-key' | 'check' | 'not-null';

// PostgreSQL SQLSTATE and better-sqlite3 extended result codes
const CONSTRAINT_CODES: Record<string, ConstraintKind> = {
  '23505': 'unique',
  '23503': 'foreign-key',
  '23514': 'check',
  '23502': 'not-null',
  SQLITE_CONSTRAINT_UNIQUE: 'unique',
  SQLITE_CONSTRAINT_PRIMARYKEY: 'unique',
  SQLITE_CONSTRAINT_FOREIGNKEY: 'foreign-key',
  SQLITE_CONSTRAINT_CHECK: 'check',
  SQLITE_CONSTRAINT_NOTNULL: 'not-null',
};

const TRANSIENT_CODES = new Set<string>([
  'ECONNREFUSED',
  'ETIMEDOUT',
  'ECONNRESET',
  'EPIPE',
  '57P01', // admin_shutdown
  '57P03', // cannot_connect_now
  '53300', // too_many_connections
  '08001', // sqlclient_unable_to_establish_sqlconnection
  '08006', // connection_failure
  'SQLITE_BUSY',
  'SQLITE_LOCKED',
]);

const TRANSIENT_MESSAGE_PARTS = [
  'connection terminated',
  'could not connect',
  'connection refused',
  'connection timeout',
  'server closed the connection',
  'database is locked',
];

function readCode(err: unknown): string | null {
  if (!err || typeof err !== 'object') {
    return null;
  }
  if ('code' in err) {
    if (typeof err.code === 'string') {
      return err.code;
    }
    if (typeof err.code === 'number') {
      return String(err.code);
    }
  }
  return 'driverError' in err ? readCode(err.driverError) : null;
}

function readMessage(err: unknown): string {
  if (!err || typeof err !== 'object') {
    return '';
  }
  if ('message' in err && typeof err.message === 'string' && err.message) {
    return err.message;
  }
  return 'driverError' in err ? readMessage(err.driverError) : '';
}

/**
 * Which integrity constraint a failed query broke, or null for any other error.
 * TypeORM copies the driver's `code` onto QueryFailedError; `driverError` is
 * checked as well for errors wrapped elsewhere.
 */
export function getConstraintViolation(err: unknown): ConstraintKind | null {
  const code = readCode(err);
  if (!code) {
    return null;
  }
  // SQLite reports ON DELETE RESTRICT through its foreign-key trigger
  if (code === 'SQLITE_CONSTRAINT_TRIGGER') {
    return readMessage(err).includes('FOREIGN KEY constraint failed') ? 'foreign-key' : null;
  }
  return CONSTRAINT_CODES[code] ?? null;
}

export function isUniqueViolation(err: unknown): boolean {
  return getConstraintViolation(err) === 'unique';
}

export function isForeignKeyViolation(err: unknown): boolean {
  return getConstraintViolation(err) === 'foreign-key';
}

export function isCheckViolation(err: unknown): boolean {
  return getConstraintViolation(err) === 'check';
}

export function isTransientDbError(err: unknown): boolean {
  if (!err || typeof err !== 'object') {
    return false;
  }

  const code = readCode(err);
  if (code && TRANSIENT_CODES.has(code)) {
    return true;
  }

  const message = readMessage(err);
  if (message) {
    const lower = message.toLowerCase();
    return TRANSIENT_MESSAGE_PARTS.some((part) => lower.includes(part));
  }

  return false;
}
