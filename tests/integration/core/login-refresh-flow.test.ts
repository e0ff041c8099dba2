/**
 * Integration Tests: login, refresh rotation, tenant permissions and logout
 * through the AuthenticationService over in-memory stores.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  assertAuthFailure,
  assertAuthSuccess,
  createTestAuthCore,
  createTestMembership,
  createTestPrincipal,
  type TestAuthCore,
} from '../../../src/testing/index.js';

describe('Login and refresh flow', () => {
  let core: TestAuthCore;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    core = createTestAuthCore({
      principals: [createTestPrincipal()],
      memberships: [createTestMembership()],
    });
    await core.service.initialize();
  });

  it('should carry one principal from login to logout', async () => {
    const first = await core.service.login('ana@example.com', 'correct-secret');
    assertAuthSuccess(first);

    const validated = await core.service.validate(first.value.accessToken);
    assertAuthSuccess(validated);
    expect(validated.value.sub).toBe('principal-1');
    expect(core.service.currentTenant({}, validated.value)).toBe('tenant-a');

    core.clock.advance(60);
    const second = await core.service.refresh(first.value.accessToken, first.value.refreshToken);
    assertAuthSuccess(second);
    expect(second.value.refreshToken).not.toBe(first.value.refreshToken);

    const replay = await core.service.refresh(first.value.accessToken, first.value.refreshToken);
    assertAuthFailure(replay);
    expect(replay.error.code).toBe('REFRESH_TOKEN_INVALID');

    await expect(core.service.permissionsFor('principal-1', 'tenant-a')).resolves.toEqual(
      new Set(['users.view', 'reports.view', 'reports.export', 'transactions.create'])
    );
    await expect(core.service.permissionsFor('principal-1', 'tenant-b')).resolves.toEqual(
      new Set()
    );

    const logout = await core.service.logout('principal-1');
    assertAuthSuccess(logout);
    expect(logout.value).toEqual({ revoked: 1 });

    const afterLogout = await core.service.refresh(
      second.value.accessToken,
      second.value.refreshToken
    );
    assertAuthFailure(afterLogout);
    expect(afterLogout.error.code).toBe('REFRESH_TOKEN_INVALID');
  });

  it('should let a refreshed token reach a tenant joined after login', async () => {
    const login = await core.service.login('ana', 'correct-secret');
    assertAuthSuccess(login);

    core.memberships.add(
      createTestMembership({ id: 'membership-2', tenantId: 'tenant-b', role: 'admin', isDefault: false })
    );
    const policy = { tenant: 'required', permission: 'users.manage' } as const;
    const request = { headers: { 'x-company-id': 'tenant-b' } };

    const before = await core.service.authorizeRequest(login.value.accessToken, request, policy);
    assertAuthSuccess(before);
    expect(before.value.role).toBe('admin');

    const refreshed = await core.service.refresh(login.value.accessToken, login.value.refreshToken);
    assertAuthSuccess(refreshed);
    const claims = await core.service.validate(refreshed.value.accessToken);
    assertAuthSuccess(claims);

    expect(claims.value.tenant_roles).toEqual([
      { tenant_id: 'tenant-a', role: 'manager' },
      { tenant_id: 'tenant-b', role: 'admin' },
    ]);
  });

  it('should agree with permissionsFor when a membership carries overrides', async () => {
    core.memberships.update('membership-1', {
      grantedPermissions: ['audit.view'],
      revokedPermissions: ['reports.export'],
    });
    const login = await core.service.login('ana', 'correct-secret');
    assertAuthSuccess(login);

    const effective = await core.service.permissionsFor('principal-1', 'tenant-a');
    const exportCheck = await core.service.authorizeRequest(login.value.accessToken, {}, {
      tenant: 'required',
      permission: 'reports.export',
    });
    const auditCheck = await core.service.authorizeRequest(login.value.accessToken, {}, {
      tenant: 'required',
      permission: 'audit.view',
    });

    expect(effective.has('reports.export')).toBe(false);
    expect(effective.has('audit.view')).toBe(true);
    assertAuthFailure(exportCheck);
    expect(exportCheck.error.code).toBe('FORBIDDEN');
    assertAuthSuccess(auditCheck);
    expect(auditCheck.value.permissions.has('audit.view')).toBe(true);
  });

  it('should stop a demoted member at the next sensitive check', async () => {
    core.memberships.add(
      createTestMembership({ id: 'membership-2', tenantId: 'tenant-b', role: 'admin', isDefault: false })
    );
    const login = await core.service.login('ana', 'correct-secret');
    assertAuthSuccess(login);

    core.memberships.update('membership-2', { role: 'viewer' });

    const result = await core.service.authorizeRequest(
      login.value.accessToken,
      { params: { companyId: 'tenant-b' } },
      { tenant: 'required', permission: 'transactions.delete' }
    );

    assertAuthFailure(result);
    expect(result.error.code).toBe('FORBIDDEN');
  });
});
