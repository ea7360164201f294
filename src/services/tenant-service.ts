import type { DownstreamClient } from '../downstream/downstream-client.js';
import { AppError } from '../errors/app-error.js';
import type { PrincipalRepository } from '../repositories/principal-repository.js';
import type { Tenant, TenantRepository } from '../repositories/tenant-repository.js';
import type { TenantCredentialStore } from './tenant-credential-store.js';

export interface ListPage {
  offset: number;
  limit: number;
}

export interface ConnectionTestResult {
  success: boolean;
  message: string;
  details?: unknown;
}

export const CONNECTION_TEST_PATH = '/ess/api/auth-test';

export class TenantService {
  public constructor(
    private readonly tenants: TenantRepository,
    private readonly principals: PrincipalRepository,
    private readonly credentials: TenantCredentialStore,
    private readonly downstream: DownstreamClient
  ) {}

  public async listTenants(page: ListPage): Promise<Tenant[]> {
    return this.tenants.listTenants(page);
  }

  public async createTenant(name: string, isActive = true): Promise<Tenant> {
    const normalizedName = name.trim();
    if (normalizedName.length === 0) {
      throw new AppError(400, 'TENANT_NAME_INVALID', 'Tenant name must not be empty.');
    }

    const existing = await this.tenants.findTenantByName(normalizedName);
    if (existing !== null) {
      throw new AppError(409, 'TENANT_NAME_IN_USE', 'A tenant with this name already exists.');
    }

    const tenant = await this.tenants.createTenant({ name: normalizedName, isActive });
    console.log('tenant_created', { tenantId: tenant.id });
    return tenant;
  }

  public async getTenant(tenantId: string): Promise<Tenant> {
    const tenant = await this.tenants.findTenantById(tenantId);
    if (tenant === null) {
      throw new AppError(404, 'TENANT_NOT_FOUND', 'Tenant not found.');
    }

    return tenant;
  }

  public async setTenantActive(tenantId: string, isActive: boolean): Promise<Tenant> {
    const tenant = await this.tenants.setTenantActive(tenantId, isActive);
    if (tenant === null) {
      throw new AppError(404, 'TENANT_NOT_FOUND', 'Tenant not found.');
    }

    return tenant;
  }

  public async deleteTenant(tenantId: string): Promise<void> {
    await this.getTenant(tenantId);

    const principalCount = await this.principals.countPrincipalsInTenant(tenantId);
    if (principalCount > 0) {
      throw new AppError(409, 'TENANT_HAS_PRINCIPALS', 'Cannot delete a tenant that still has users.', {
        principalCount
      });
    }

    await this.tenants.deleteTenant(tenantId);
    console.log('tenant_deleted', { tenantId });
  }

  public async testConnection(tenantId: string): Promise<ConnectionTestResult> {
    await this.getTenant(tenantId);

    try {
      const target = await this.credentials.resolveTarget(tenantId);
      const details = await this.downstream.requestJson(target, CONNECTION_TEST_PATH);
      return { success: true, message: 'Connection successful.', details };
    } catch (error) {
      if (error instanceof AppError) {
        return { success: false, message: error.message };
      }

      throw error;
    }
  }
}
