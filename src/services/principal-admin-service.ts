import { AppError } from '../errors/app-error.js';
import type { Principal, PrincipalChanges, PrincipalRepository } from '../repositories/principal-repository.js';
import type { TenantRepository } from '../repositories/tenant-repository.js';
import { hashPassword, validatePasswordStrength } from '../security/passwords.js';
import type { ListPage } from './tenant-service.js';

export interface PrincipalView {
  id: string;
  email: string;
  fullName: string | null;
  jobTitle: string | null;
  phone: string | null;
  tenantId: string;
  isActive: boolean;
  isAdmin: boolean;
  hrEmployeeId: number | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreatePrincipalRequest {
  email: string;
  password: string;
  tenantId: string;
  fullName?: string | null;
  jobTitle?: string | null;
  phone?: string | null;
  isActive?: boolean;
  isAdmin?: boolean;
  hrEmployeeId?: number | null;
}

/** Partial update sent by an administrator; absent fields stay as they are. */
export interface PrincipalUpdate {
  email?: string;
  password?: string;
  fullName?: string | null;
  jobTitle?: string | null;
  phone?: string | null;
  tenantId?: string;
  isActive?: boolean;
  isAdmin?: boolean;
  hrEmployeeId?: number | null;
}

export function toPrincipalView(principal: Principal): PrincipalView {
  return {
    id: principal.id,
    email: principal.email,
    fullName: principal.fullName,
    jobTitle: principal.jobTitle,
    phone: principal.phone,
    tenantId: principal.tenantId,
    isActive: principal.isActive,
    isAdmin: principal.isAdmin,
    hrEmployeeId: principal.hrEmployeeId,
    createdAt: principal.createdAt,
    updatedAt: principal.updatedAt
  };
}

export class PrincipalAdminService {
  public constructor(
    private readonly principals: PrincipalRepository,
    private readonly tenants: TenantRepository
  ) {}

  public async listPrincipals(page: ListPage): Promise<PrincipalView[]> {
    const principals = await this.principals.listPrincipals(page);
    return principals.map(toPrincipalView);
  }

  public async getPrincipal(principalId: string): Promise<PrincipalView> {
    return toPrincipalView(await this.requirePrincipal(principalId));
  }

  public async createPrincipal(request: CreatePrincipalRequest): Promise<PrincipalView> {
    validatePasswordStrength(request.password);
    await this.requireTenant(request.tenantId);

    const existing = await this.principals.findPrincipalByEmail(request.email);
    if (existing !== null) {
      throw new AppError(409, 'PRINCIPAL_EMAIL_IN_USE', 'Email is already registered.');
    }

    const principal = await this.principals.createPrincipal({
      email: request.email,
      passwordHash: await hashPassword(request.password),
      tenantId: request.tenantId,
      fullName: request.fullName ?? null,
      jobTitle: request.jobTitle ?? null,
      phone: request.phone ?? null,
      isActive: request.isActive ?? true,
      isAdmin: request.isAdmin ?? false,
      hrEmployeeId: request.hrEmployeeId ?? null
    });

    console.log('principal_created', { principalId: principal.id, tenantId: principal.tenantId });
    return toPrincipalView(principal);
  }

  public async updatePrincipal(principalId: string, update: PrincipalUpdate): Promise<PrincipalView> {
    const current = await this.requirePrincipal(principalId);
    const changes: PrincipalChanges = {};

    if (update.email !== undefined && update.email.trim().toLowerCase() !== current.email) {
      const owner = await this.principals.findPrincipalByEmail(update.email);
      if (owner !== null && owner.id !== principalId) {
        throw new AppError(409, 'PRINCIPAL_EMAIL_IN_USE', 'Email is already registered.');
      }

      changes.email = update.email;
    }

    if (update.password !== undefined) {
      validatePasswordStrength(update.password);
      changes.passwordHash = await hashPassword(update.password);
    }

    if (update.tenantId !== undefined) {
      await this.requireTenant(update.tenantId);
      changes.tenantId = update.tenantId;
    }

    if (update.fullName !== undefined) {
      changes.fullName = update.fullName;
    }

    if (update.jobTitle !== undefined) {
      changes.jobTitle = update.jobTitle;
    }

    if (update.phone !== undefined) {
      changes.phone = update.phone;
    }

    if (update.isActive !== undefined) {
      changes.isActive = update.isActive;
    }

    if (update.isAdmin !== undefined) {
      changes.isAdmin = update.isAdmin;
    }

    if (update.hrEmployeeId !== undefined) {
      changes.hrEmployeeId = update.hrEmployeeId;
    }

    const updated = await this.principals.updatePrincipal(principalId, changes, new Date());
    if (updated === null) {
      throw new AppError(404, 'PRINCIPAL_NOT_FOUND', 'User not found.');
    }

    return toPrincipalView(updated);
  }

  public async deletePrincipal(actorPrincipalId: string, principalId: string): Promise<void> {
    if (actorPrincipalId === principalId) {
      throw new AppError(400, 'PRINCIPAL_DELETE_SELF', 'Administrators cannot delete their own account.');
    }

    const deleted = await this.principals.deletePrincipal(principalId);
    if (!deleted) {
      throw new AppError(404, 'PRINCIPAL_NOT_FOUND', 'User not found.');
    }

    console.log('principal_deleted', { principalId, actorPrincipalId });
  }

  private async requirePrincipal(principalId: string): Promise<Principal> {
    const principal = await this.principals.findPrincipalById(principalId);
    if (principal === null) {
      throw new AppError(404, 'PRINCIPAL_NOT_FOUND', 'User not found.');
    }

    return principal;
  }

  private async requireTenant(tenantId: string): Promise<void> {
    const tenant = await this.tenants.findTenantById(tenantId);
    if (tenant === null) {
      throw new AppError(404, 'TENANT_NOT_FOUND', 'Tenant not found.');
    }
  }
}
