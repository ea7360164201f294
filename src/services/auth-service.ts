import { createHash, randomBytes } from 'node:crypto';

import type { RequestAuthContext } from '../auth/auth-context.js';
import { AppError } from '../errors/app-error.js';
import type { Principal, PrincipalRepository } from '../repositories/principal-repository.js';
import type { TenantRepository } from '../repositories/tenant-repository.js';
import { hashPassword, validatePasswordStrength, verifyPassword } from '../security/passwords.js';
import type { EmailSender } from './email-sender.js';
import type { AccessClaims, TokenPair, TokenService } from './token-service.js';

export interface AuthServiceConfig {
  lockoutAttempts: number;
  lockoutSeconds: number;
  resetTokenTtlMinutes: number;
  portalBaseUrl: string;
}

export const PASSWORD_RESET_ACKNOWLEDGEMENT =
  'If an account with that email exists, a password reset link has been sent.';

function hashResetToken(token: string): string {
  return createHash('sha256').update(token).digest('hex');
}

function toAuthContext(principal: Principal): RequestAuthContext {
  return {
    principalId: principal.id,
    tenantId: principal.tenantId,
    email: principal.email,
    isAdmin: principal.isAdmin,
    hrEmployeeId: principal.hrEmployeeId
  };
}

function buildResetLink(portalBaseUrl: string, token: string): string {
  return `${portalBaseUrl.replace(/\/+$/, '')}/reset-password?token=${encodeURIComponent(token)}`;
}

export class AuthService {
  public constructor(
    private readonly principals: PrincipalRepository,
    private readonly tenants: TenantRepository,
    private readonly tokens: TokenService,
    private readonly emailSender: EmailSender,
    private readonly config: AuthServiceConfig
  ) {}

  public async login(email: string, password: string, now: Date): Promise<TokenPair> {
    const principal = await this.principals.findPrincipalByEmail(email);
    if (principal === null) {
      throw new AppError(401, 'AUTH_INVALID_CREDENTIALS', 'Incorrect email or password.');
    }

    if (principal.lockoutUntil !== null && principal.lockoutUntil.getTime() > now.getTime()) {
      throw new AppError(423, 'AUTH_ACCOUNT_LOCKED', 'Account is temporarily locked.', {
        retryAt: principal.lockoutUntil.toISOString()
      });
    }

    const validPassword = await verifyPassword(principal.passwordHash, password);
    if (!validPassword) {
      const failedLoginAttempts = principal.failedLoginAttempts + 1;
      let lockoutUntil: Date | null = null;

      if (failedLoginAttempts >= this.config.lockoutAttempts) {
        lockoutUntil = new Date(now.getTime() + this.config.lockoutSeconds * 1_000);
      }

      await this.principals.recordFailedLogin(principal.id, failedLoginAttempts, lockoutUntil);

      if (lockoutUntil !== null) {
        console.warn('auth_account_locked', { principalId: principal.id, failedLoginAttempts });
        throw new AppError(423, 'AUTH_ACCOUNT_LOCKED', 'Account is temporarily locked.', {
          retryAt: lockoutUntil.toISOString()
        });
      }

      throw new AppError(401, 'AUTH_INVALID_CREDENTIALS', 'Incorrect email or password.');
    }

    const claims = await this.resolveClaims(principal);
    if (claims === null) {
      throw new AppError(403, 'AUTH_PRINCIPAL_INACTIVE', 'Inactive user.');
    }

    await this.principals.clearFailedLoginState(principal.id);

    return {
      accessToken: await this.tokens.issueAccess(principal.id, claims),
      refreshToken: await this.tokens.issueRefresh(principal.id)
    };
  }

  public async refresh(refreshToken: string): Promise<TokenPair> {
    return this.tokens.refreshCycle(refreshToken, async (subject) => {
      const principal = await this.principals.findPrincipalById(subject);
      return principal === null ? null : this.resolveClaims(principal);
    });
  }

  /**
   * Resolves the caller behind an access token. Privilege comes from the
   * stored principal, not from the token's claim.
   */
  public async authenticate(accessToken: string): Promise<RequestAuthContext> {
    const verified = await this.tokens.verifyAccess(accessToken);
    const principal = await this.principals.findPrincipalById(verified.subject);
    if (principal === null) {
      throw new AppError(401, 'AUTH_ACCESS_TOKEN_INVALID', 'Could not validate credentials (access token).');
    }

    if (!principal.isActive) {
      throw new AppError(403, 'AUTH_PRINCIPAL_INACTIVE', 'Inactive user.');
    }

    return toAuthContext(principal);
  }

  public async requestPasswordReset(email: string): Promise<string> {
    const principal = await this.principals.findPrincipalByEmail(email);
    if (principal === null || !principal.isActive) {
      return PASSWORD_RESET_ACKNOWLEDGEMENT;
    }

    const token = randomBytes(32).toString('base64url');
    const expiresAt = new Date(Date.now() + this.config.resetTokenTtlMinutes * 60_000);
    await this.principals.setPasswordResetToken(principal.id, hashResetToken(token), expiresAt);

    const resetLink = buildResetLink(this.config.portalBaseUrl, token);

    try {
      await this.emailSender.send({
        to: principal.email,
        subject: 'Password Reset Request',
        text: [
          'You requested a password reset for your employee portal account.',
          `Open the link below to choose a new password. It expires in ${this.config.resetTokenTtlMinutes} minutes.`,
          '',
          resetLink,
          '',
          'If you did not request this, you can ignore this email.'
        ].join('\n')
      });
    } catch (error) {
      console.error('password_reset_email_failed', {
        principalId: principal.id,
        error: error instanceof Error ? error.message : 'unknown'
      });
      throw new AppError(500, 'AUTH_RESET_EMAIL_FAILED', 'Error sending password reset email. Please try again later.');
    }

    return PASSWORD_RESET_ACKNOWLEDGEMENT;
  }

  public async resetPassword(token: string, newPassword: string): Promise<void> {
    validatePasswordStrength(newPassword);

    const passwordHash = await hashPassword(newPassword);
    const principal = await this.principals.resetPasswordWithToken(hashResetToken(token), passwordHash, new Date());

    if (principal === null) {
      throw new AppError(400, 'AUTH_RESET_TOKEN_INVALID', 'Password reset token is invalid or expired.');
    }

    console.log('password_reset_completed', { principalId: principal.id });
  }

  private async resolveClaims(principal: Principal): Promise<AccessClaims | null> {
    if (!principal.isActive) {
      return null;
    }

    const tenant = await this.tenants.findTenantById(principal.tenantId);
    if (tenant === null || !tenant.isActive) {
      return null;
    }

    return { isAdmin: principal.isAdmin };
  }
}
