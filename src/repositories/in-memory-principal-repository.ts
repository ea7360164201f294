import { randomUUID } from 'node:crypto';

import { AppError } from '../errors/app-error.js';
import type {
  CreatePrincipalInput,
  ListPrincipalsInput,
  Principal,
  PrincipalChanges,
  PrincipalRepository
} from './principal-repository.js';

function clonePrincipal(principal: Principal): Principal {
  return {
    ...principal,
    passwordUpdatedAt: new Date(principal.passwordUpdatedAt),
    lockoutUntil: principal.lockoutUntil === null ? null : new Date(principal.lockoutUntil),
    resetTokenExpiresAt: principal.resetTokenExpiresAt === null ? null : new Date(principal.resetTokenExpiresAt),
    createdAt: new Date(principal.createdAt),
    updatedAt: new Date(principal.updatedAt)
  };
}

function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

function emailInUse(): AppError {
  return new AppError(409, 'PRINCIPAL_EMAIL_IN_USE', 'Email is already registered.');
}

export class InMemoryPrincipalRepository implements PrincipalRepository {
  private readonly principalsById = new Map<string, Principal>();

  private readonly principalIdsByEmail = new Map<string, string>();

  public createPrincipal(input: CreatePrincipalInput): Promise<Principal> {
    const email = normalizeEmail(input.email);
    if (this.principalIdsByEmail.has(email)) {
      return Promise.reject(emailInUse());
    }

    const now = new Date();
    const principal: Principal = {
      id: randomUUID(),
      email,
      passwordHash: input.passwordHash,
      fullName: input.fullName ?? null,
      jobTitle: input.jobTitle ?? null,
      phone: input.phone ?? null,
      tenantId: input.tenantId,
      isActive: input.isActive ?? true,
      isAdmin: input.isAdmin ?? false,
      hrEmployeeId: input.hrEmployeeId ?? null,
      passwordUpdatedAt: now,
      failedLoginAttempts: 0,
      lockoutUntil: null,
      resetTokenHash: null,
      resetTokenExpiresAt: null,
      createdAt: now,
      updatedAt: now
    };

    this.principalsById.set(principal.id, principal);
    this.principalIdsByEmail.set(principal.email, principal.id);

    return Promise.resolve(clonePrincipal(principal));
  }

  public findPrincipalById(principalId: string): Promise<Principal | null> {
    const principal = this.principalsById.get(principalId);
    return Promise.resolve(principal === undefined ? null : clonePrincipal(principal));
  }

  public findPrincipalByEmail(email: string): Promise<Principal | null> {
    const principalId = this.principalIdsByEmail.get(normalizeEmail(email));
    if (principalId === undefined) {
      return Promise.resolve(null);
    }

    return this.findPrincipalById(principalId);
  }

  public listPrincipals(input: ListPrincipalsInput): Promise<Principal[]> {
    const principals = Array.from(this.principalsById.values())
      .sort((left, right) => left.createdAt.getTime() - right.createdAt.getTime() || left.email.localeCompare(right.email))
      .slice(input.offset, input.offset + input.limit)
      .map(clonePrincipal);

    return Promise.resolve(principals);
  }

  public countPrincipalsInTenant(tenantId: string): Promise<number> {
    let count = 0;
    for (const principal of this.principalsById.values()) {
      if (principal.tenantId === tenantId) {
        count += 1;
      }
    }

    return Promise.resolve(count);
  }

  public updatePrincipal(principalId: string, changes: PrincipalChanges, now: Date): Promise<Principal | null> {
    const principal = this.principalsById.get(principalId);
    if (principal === undefined) {
      return Promise.resolve(null);
    }

    if (changes.email !== undefined) {
      const email = normalizeEmail(changes.email);
      const ownerId = this.principalIdsByEmail.get(email);
      if (ownerId !== undefined && ownerId !== principal.id) {
        return Promise.reject(emailInUse());
      }

      this.principalIdsByEmail.delete(principal.email);
      this.principalIdsByEmail.set(email, principal.id);
      principal.email = email;
    }

    if (changes.passwordHash !== undefined) {
      principal.passwordHash = changes.passwordHash;
      principal.passwordUpdatedAt = new Date(now);
    }

    if (changes.fullName !== undefined) {
      principal.fullName = changes.fullName;
    }

    if (changes.jobTitle !== undefined) {
      principal.jobTitle = changes.jobTitle;
    }

    if (changes.phone !== undefined) {
      principal.phone = changes.phone;
    }

    if (changes.tenantId !== undefined) {
      principal.tenantId = changes.tenantId;
    }

    if (changes.isActive !== undefined) {
      principal.isActive = changes.isActive;
    }

    if (changes.isAdmin !== undefined) {
      principal.isAdmin = changes.isAdmin;
    }

    if (changes.hrEmployeeId !== undefined) {
      principal.hrEmployeeId = changes.hrEmployeeId;
    }

    principal.updatedAt = new Date(now);
    return Promise.resolve(clonePrincipal(principal));
  }

  public deletePrincipal(principalId: string): Promise<boolean> {
    const principal = this.principalsById.get(principalId);
    if (principal === undefined) {
      return Promise.resolve(false);
    }

    this.principalsById.delete(principalId);
    this.principalIdsByEmail.delete(principal.email);
    return Promise.resolve(true);
  }

  public recordFailedLogin(principalId: string, failedLoginAttempts: number, lockoutUntil: Date | null): Promise<void> {
    const principal = this.principalsById.get(principalId);
    if (principal === undefined) {
      return Promise.resolve();
    }

    principal.failedLoginAttempts = failedLoginAttempts;
    principal.lockoutUntil = lockoutUntil;
    principal.updatedAt = new Date();
    return Promise.resolve();
  }

  public clearFailedLoginState(principalId: string): Promise<void> {
    const principal = this.principalsById.get(principalId);
    if (principal === undefined) {
      return Promise.resolve();
    }

    principal.failedLoginAttempts = 0;
    principal.lockoutUntil = null;
    principal.updatedAt = new Date();
    return Promise.resolve();
  }

  public setPasswordResetToken(principalId: string, tokenHash: string, expiresAt: Date): Promise<void> {
    const principal = this.principalsById.get(principalId);
    if (principal === undefined) {
      return Promise.resolve();
    }

    principal.resetTokenHash = tokenHash;
    principal.resetTokenExpiresAt = new Date(expiresAt);
    principal.updatedAt = new Date();
    return Promise.resolve();
  }

  public resetPasswordWithToken(tokenHash: string, passwordHash: string, now: Date): Promise<Principal | null> {
    for (const principal of this.principalsById.values()) {
      if (principal.resetTokenHash !== tokenHash || principal.resetTokenExpiresAt === null) {
        continue;
      }

      if (principal.resetTokenExpiresAt.getTime() <= now.getTime() || !principal.isActive) {
        return Promise.resolve(null);
      }

      principal.passwordHash = passwordHash;
      principal.passwordUpdatedAt = new Date(now);
      principal.resetTokenHash = null;
      principal.resetTokenExpiresAt = null;
      principal.failedLoginAttempts = 0;
      principal.lockoutUntil = null;
      principal.updatedAt = new Date(now);
      return Promise.resolve(clonePrincipal(principal));
    }

    return Promise.resolve(null);
  }
}
