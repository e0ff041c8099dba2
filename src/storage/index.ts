export type {
  PrincipalStore,
  MembershipStore,
  RefreshTokenStore,
  PermissionGrantSource,
} from './types.js';

export {
  InMemoryPrincipalStore,
  InMemoryMembershipStore,
  InMemoryRefreshTokenStore,
  StaticPermissionGrantSource,
} from './in-memory.js';

export {
  PostgresPrincipalStore,
  PostgresMembershipStore,
  PostgresRefreshTokenStore,
  PostgresPermissionGrantSource,
  createPostgresStores,
  createPostgresPool,
  type Queryable,
  type PooledQueryable,
  type SqlResult,
  type PostgresConnectionConfig,
  type PostgresStores,
} from './postgres.js';
