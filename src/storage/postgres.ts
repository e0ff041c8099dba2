/**
 * PostgreSQL stores
 *
 * Parameterized queries only. The refresh token rotation runs in a single
 * transaction guarded by a conditional UPDATE; see sql/schema.sql for the
 * tables and the partial unique index that keeps one active token per
 * (principal, session).
 */

import pg from 'pg';
const { Pool } = pg;
import type {
  Principal,
  TenantMembership,
  PermissionGrant,
  RefreshTokenRecord,
  RefreshTokenState,
} from '../core/types.js';
import type {
  PrincipalStore,
  MembershipStore,
  RefreshTokenStore,
  PermissionGrantSource,
} from './types.js';
import { sanitizeError } from '../utils/errors.js';

// ============================================================================
// Driver seam
// ============================================================================

type Row = Record<string, unknown>;

export interface SqlResult {
  rows: Row[];
  rowCount: number | null;
}

/** The part of pg.Pool / pg.PoolClient the stores use */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
}

export interface PooledQueryable extends Queryable {
  connect(): Promise<Queryable & { release(): void }>;
}

export interface PostgresConnectionConfig {
  connectionString?: string;
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
  ssl?: boolean | { rejectUnauthorized?: boolean; ca?: string };
  pool?: {
    max?: number;
    idleTimeoutMillis?: number;
    connectionTimeoutMillis?: number;
  };
}

export function createPostgresPool(config: PostgresConnectionConfig): pg.Pool {
  return new Pool({
    connectionString: config.connectionString,
    host: config.host,
    port: config.port ?? 5432,
    database: config.database,
    user: config.user,
    password: config.password,
    ssl: config.ssl ?? false,
    max: config.pool?.max ?? 10,
    idleTimeoutMillis: config.pool?.idleTimeoutMillis ?? 30000,
    connectionTimeoutMillis: config.pool?.connectionTimeoutMillis ?? 5000,
  });
}

// ============================================================================
// Row mapping
// ============================================================================

function text(row: Row, column: string): string {
  const value = row[column];
  if (typeof value !== 'string') {
    throw new Error(`Unexpected value in column ${column}`);
  }
  return value;
}

function optionalText(row: Row, column: string): string | null {
  const value = row[column];
  return value === null || value === undefined ? null : text(row, column);
}

function bool(row: Row, column: string): boolean {
  const value = row[column];
  if (typeof value !== 'boolean') {
    throw new Error(`Unexpected value in column ${column}`);
  }
  return value;
}

function timestamp(row: Row, column: string): Date {
  const value = row[column];
  if (value instanceof Date) {
    return value;
  }
  if (typeof value === 'string') {
    return new Date(value);
  }
  throw new Error(`Unexpected value in column ${column}`);
}

function optionalTimestamp(row: Row, column: string): Date | null {
  const value = row[column];
  return value === null || value === undefined ? null : timestamp(row, column);
}

function textArray(row: Row, column: string): string[] {
  const value = row[column];
  if (value === null || value === undefined) {
    return [];
  }
  if (!Array.isArray(value) || !value.every((item) => typeof item === 'string')) {
    throw new Error(`Unexpected value in column ${column}`);
  }
  return value.map(String);
}

function refreshState(row: Row): RefreshTokenState {
  const value = text(row, 'state');
  if (value === 'active' || value === 'consumed' || value === 'revoked') {
    return value;
  }
  throw new Error(`Unexpected refresh token state: ${value}`);
}

function toPrincipal(row: Row): Principal {
  return {
    id: text(row, 'id'),
    username: text(row, 'username'),
    email: text(row, 'email'),
    credentialHash: text(row, 'credential_hash'),
    isActive: bool(row, 'is_active'),
    firstName: optionalText(row, 'first_name'),
    lastName: optionalText(row, 'last_name'),
  };
}

function toMembership(row: Row): TenantMembership {
  return {
    id: text(row, 'id'),
    principalId: text(row, 'principal_id'),
    tenantId: text(row, 'tenant_id'),
    role: text(row, 'role'),
    isActive: bool(row, 'is_active'),
    isDefault: bool(row, 'is_default'),
    grantedPermissions: textArray(row, 'granted_permissions'),
    revokedPermissions: textArray(row, 'revoked_permissions'),
  };
}

function toRefreshRecord(row: Row): RefreshTokenRecord {
  return {
    id: text(row, 'id'),
    tokenHash: text(row, 'token_hash'),
    principalId: text(row, 'principal_id'),
    sessionId: text(row, 'session_id'),
    issuedAt: timestamp(row, 'issued_at'),
    expiresAt: timestamp(row, 'expires_at'),
    state: refreshState(row),
    replacedById: optionalText(row, 'replaced_by_id'),
    consumedAt: optionalTimestamp(row, 'consumed_at'),
    revokedAt: optionalTimestamp(row, 'revoked_at'),
  };
}

// ============================================================================
// Stores
// ============================================================================

const PRINCIPAL_COLUMNS =
  'id, username, email, credential_hash, is_active, first_name, last_name';

export class PostgresPrincipalStore implements PrincipalStore {
  constructor(private readonly db: Queryable) {}

  async findByEmail(email: string): Promise<Principal | null> {
    const result = await this.db.query(
      `SELECT ${PRINCIPAL_COLUMNS} FROM principals WHERE lower(email) = lower($1) LIMIT 1`,
      [email]
    );
    return result.rows.length > 0 ? toPrincipal(result.rows[0]) : null;
  }

  async findByUsername(username: string): Promise<Principal | null> {
    const result = await this.db.query(
      `SELECT ${PRINCIPAL_COLUMNS} FROM principals WHERE username = $1 LIMIT 1`,
      [username]
    );
    return result.rows.length > 0 ? toPrincipal(result.rows[0]) : null;
  }

  async findById(id: string): Promise<Principal | null> {
    const result = await this.db.query(
      `SELECT ${PRINCIPAL_COLUMNS} FROM principals WHERE id = $1`,
      [id]
    );
    return result.rows.length > 0 ? toPrincipal(result.rows[0]) : null;
  }
}

const MEMBERSHIP_COLUMNS =
  'id, principal_id, tenant_id, role, is_active, is_default, granted_permissions, revoked_permissions';

export class PostgresMembershipStore implements MembershipStore {
  constructor(private readonly db: Queryable) {}

  async listForPrincipal(principalId: string): Promise<TenantMembership[]> {
    const result = await this.db.query(
      `SELECT ${MEMBERSHIP_COLUMNS} FROM tenant_memberships WHERE principal_id = $1 ORDER BY tenant_id`,
      [principalId]
    );
    return result.rows.map(toMembership);
  }

  async find(principalId: string, tenantId: string): Promise<TenantMembership | null> {
    const result = await this.db.query(
      `SELECT ${MEMBERSHIP_COLUMNS} FROM tenant_memberships WHERE principal_id = $1 AND tenant_id = $2`,
      [principalId, tenantId]
    );
    return result.rows.length > 0 ? toMembership(result.rows[0]) : null;
  }
}

const REFRESH_COLUMNS =
  'id, token_hash, principal_id, session_id, issued_at, expires_at, state, replaced_by_id, consumed_at, revoked_at';

const INSERT_REFRESH = `INSERT INTO refresh_tokens (${REFRESH_COLUMNS})
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)`;

function insertValues(record: RefreshTokenRecord): unknown[] {
  return [
    record.id,
    record.tokenHash,
    record.principalId,
    record.sessionId,
    record.issuedAt,
    record.expiresAt,
    record.state,
    record.replacedById,
    record.consumedAt,
    record.revokedAt,
  ];
}

export class PostgresRefreshTokenStore implements RefreshTokenStore {
  constructor(private readonly pool: PooledQueryable) {}

  async create(record: RefreshTokenRecord): Promise<void> {
    await this.pool.query(INSERT_REFRESH, insertValues(record));
  }

  async findByHash(tokenHash: string): Promise<RefreshTokenRecord | null> {
    const result = await this.pool.query(
      `SELECT ${REFRESH_COLUMNS} FROM refresh_tokens WHERE token_hash = $1`,
      [tokenHash]
    );
    return result.rows.length > 0 ? toRefreshRecord(result.rows[0]) : null;
  }

  async redeemAndReplace(
    presentedId: string,
    successor: RefreshTokenRecord,
    now: Date
  ): Promise<boolean> {
    const client = await this.pool.connect();

    try {
      await client.query('BEGIN');

      const updated = await client.query(
        `UPDATE refresh_tokens
           SET state = 'consumed', consumed_at = $2, replaced_by_id = $3
         WHERE id = $1 AND state = 'active' AND expires_at > $2`,
        [presentedId, now, successor.id]
      );

      if ((updated.rowCount ?? 0) !== 1) {
        await client.query('ROLLBACK');
        return false;
      }

      await client.query(INSERT_REFRESH, insertValues(successor));
      await client.query('COMMIT');
      return true;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        console.error(
          '[PostgresRefreshTokenStore] Rollback failed:',
          sanitizeError(rollbackError)
        );
      }
      throw error;
    } finally {
      client.release();
    }
  }

  async revokeActive(principalId: string, now: Date, sessionId?: string): Promise<number> {
    const result =
      sessionId === undefined
        ? await this.pool.query(
            `UPDATE refresh_tokens SET state = 'revoked', revoked_at = $2
             WHERE principal_id = $1 AND state = 'active'`,
            [principalId, now]
          )
        : await this.pool.query(
            `UPDATE refresh_tokens SET state = 'revoked', revoked_at = $2
             WHERE principal_id = $1 AND session_id = $3 AND state = 'active'`,
            [principalId, now, sessionId]
          );
    return result.rowCount ?? 0;
  }

  async purge(cutoff: Date): Promise<number> {
    const result = await this.pool.query(
      `DELETE FROM refresh_tokens
       WHERE (state = 'consumed' AND COALESCE(consumed_at, expires_at) < $1)
          OR (state = 'revoked' AND COALESCE(revoked_at, expires_at) < $1)
          OR (state = 'active' AND expires_at < $1)`,
      [cutoff]
    );
    return result.rowCount ?? 0;
  }
}

export class PostgresPermissionGrantSource implements PermissionGrantSource {
  constructor(private readonly db: Queryable) {}

  async loadGrants(): Promise<PermissionGrant[]> {
    const result = await this.db.query(
      'SELECT role, tenant_id, permissions FROM permission_grants ORDER BY role, tenant_id'
    );
    return result.rows.map((row) => ({
      role: text(row, 'role'),
      tenantId: optionalText(row, 'tenant_id'),
      permissions: textArray(row, 'permissions'),
    }));
  }
}

export interface PostgresStores {
  principals: PostgresPrincipalStore;
  memberships: PostgresMembershipStore;
  refreshTokens: PostgresRefreshTokenStore;
  permissionGrants: PostgresPermissionGrantSource;
}

export function createPostgresStores(pool: PooledQueryable): PostgresStores {
  return {
    principals: new PostgresPrincipalStore(pool),
    memberships: new PostgresMembershipStore(pool),
    refreshTokens: new PostgresRefreshTokenStore(pool),
    permissionGrants: new PostgresPermissionGrantSource(pool),
  };
}
