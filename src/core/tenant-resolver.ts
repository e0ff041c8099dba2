/**
 * Tenant Resolver
 *
 * Precedence, highest first:
 *
 * 1. explicit  - tenant id sent out-of-band by the caller (header), lets an
 *                authenticated caller switch company without logging in again
 * 2. route     - tenant id scoped to the addressed resource (route parameter)
 * 3. token-default - default_tenant_id claim
 *
 * Resolution never checks membership; that is the guard's job.
 */

import type {
  AccessTokenClaims,
  TenantRequest,
  TenantSignals,
  TenantResolution,
} from './types.js';

export interface TenantResolverOptions {
  /** Header carrying an explicit tenant id (default: x-company-id) */
  explicitHeader?: string;
  /** Route parameter naming the tenant (default: companyId) */
  routeParam?: string;
}

export const DEFAULT_TENANT_HEADER = 'x-company-id';
export const DEFAULT_TENANT_ROUTE_PARAM = 'companyId';

function nonBlank(value: string | null | undefined): string | null {
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

export class TenantResolver {
  private readonly explicitHeader: string;
  private readonly routeParam: string;

  constructor(options: TenantResolverOptions = {}) {
    this.explicitHeader = (options.explicitHeader ?? DEFAULT_TENANT_HEADER).toLowerCase();
    this.routeParam = options.routeParam ?? DEFAULT_TENANT_ROUTE_PARAM;
  }

  /**
   * Read the explicit and route-scoped tenant ids from a request.
   * Header names compare case-insensitively; a repeated header uses its first value.
   */
  extractTenantSignals(request: TenantRequest): TenantSignals {
    let explicitTenantId: string | null = null;

    for (const [name, value] of Object.entries(request.headers ?? {})) {
      if (name.toLowerCase() !== this.explicitHeader) {
        continue;
      }
      explicitTenantId = nonBlank(Array.isArray(value) ? value[0] : value);
      break;
    }

    return {
      explicitTenantId,
      routeTenantId: nonBlank(request.params?.[this.routeParam]),
    };
  }

  resolveTenant(
    request: TenantRequest,
    claims: Pick<AccessTokenClaims, 'default_tenant_id'> | null
  ): TenantResolution {
    return this.resolveFromSignals(this.extractTenantSignals(request), claims);
  }

  resolveFromSignals(
    signals: TenantSignals,
    claims: Pick<AccessTokenClaims, 'default_tenant_id'> | null
  ): TenantResolution {
    const explicit = nonBlank(signals.explicitTenantId);
    if (explicit) {
      return { resolved: true, tenantId: explicit, source: 'explicit' };
    }

    const route = nonBlank(signals.routeTenantId);
    if (route) {
      return { resolved: true, tenantId: route, source: 'route' };
    }

    const fallback = nonBlank(claims?.default_tenant_id);
    if (fallback) {
      return { resolved: true, tenantId: fallback, source: 'token-default' };
    }

    return { resolved: false };
  }
}
