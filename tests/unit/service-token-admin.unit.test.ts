import { beforeEach, describe, expect, it } from 'vitest';

import { runTokenAdminCommand } from '../../src/connector/token-admin.js';
import { AppError } from '../../src/errors/app-error.js';
import { InMemoryApiLogRepository } from '../../src/repositories/in-memory-api-log-repository.js';
import { InMemoryServiceTokenRepository } from '../../src/repositories/in-memory-service-token-repository.js';
import { ApiLogService } from '../../src/services/api-log-service.js';
import { hashServiceToken, parseScope, ServiceTokenService } from '../../src/services/service-token-service.js';

describe('service token service', () => {
  let repository: InMemoryServiceTokenRepository;
  let service: ServiceTokenService;
  let accountId: string;

  beforeEach(async () => {
    repository = new InMemoryServiceTokenRepository();
    service = new ServiceTokenService(repository);
    accountId = (await service.createAccount('portal', 'Portal Integration')).id;
  });

  it('returns the token once and keeps only its hash and prefix', async () => {
    const issued = await service.createServiceToken({ accountId, label: 'primary', scope: ['hr.leave'] });

    expect(issued.serviceToken.tokenPrefix).toBe(issued.token.slice(0, 6));
    expect(issued.serviceToken.scope).toEqual(['hr.leave']);
    expect(JSON.stringify(issued.serviceToken)).not.toContain(issued.token);
    await expect(service.authenticate(issued.token)).resolves.toMatchObject({
      serviceToken: { id: issued.serviceToken.id },
      account: { id: accountId }
    });
    expect(hashServiceToken(issued.token)).toHaveLength(64);
  });

  it('invalidates the old value on rotation', async () => {
    const issued = await service.createServiceToken({ accountId, label: 'primary' });
    const rotated = await service.rotateServiceToken(issued.serviceToken.id);

    await expect(service.authenticate(issued.token)).resolves.toBeNull();
    await expect(service.authenticate(rotated.token)).resolves.not.toBeNull();
  });

  it('stops authenticating a deactivated token', async () => {
    const issued = await service.createServiceToken({ accountId, label: 'primary' });

    const toggled = await service.toggleActive(issued.serviceToken.id);

    expect(toggled.isActive).toBe(false);
    await expect(service.authenticate(issued.token)).resolves.toBeNull();
  });

  it('validates scope entries against the known resource kinds', async () => {
    const issued = await service.createServiceToken({ accountId, label: 'primary' });

    expect(parseScope([' hr.leave ', 'hr.leave', '', 'ir.attachment'])).toEqual(['hr.leave', 'ir.attachment']);
    expect(() => parseScope(['hr.salary'])).toThrow(AppError);
    await expect(service.setScope(issued.serviceToken.id, ['hr.payslip'])).resolves.toMatchObject({ scope: ['hr.payslip'] });
    await expect(service.setScope(issued.serviceToken.id, [])).resolves.toMatchObject({ scope: [] });
  });

  it('answers 404 for an unknown account or token', async () => {
    await expect(service.createServiceToken({ accountId: 'missing', label: 'x' })).rejects.toMatchObject({ statusCode: 404 });
    await expect(service.rotateServiceToken('missing')).rejects.toMatchObject({ statusCode: 404 });
  });
});

describe('token admin command', () => {
  let serviceTokens: ServiceTokenService;
  let apiLog: ApiLogService;
  let output: string[];

  beforeEach(() => {
    serviceTokens = new ServiceTokenService(new InMemoryServiceTokenRepository());
    apiLog = new ApiLogService(new InMemoryApiLogRepository());
    output = [];
  });

  async function run(...argv: string[]): Promise<void> {
    await runTokenAdminCommand(argv, { serviceTokens, apiLog }, (line) => {
      output.push(line);
    });
  }

  it('creates an account and a scoped token, then lists it', async () => {
    await run('create-account', '--login', 'portal', '--name', 'Portal Integration');
    const account = /account (\S+) /.exec(output[0] ?? '')?.[1] ?? '';

    await run('create-token', '--account', account, '--label', 'primary', '--scope', 'hr.leave,hr.payslip');
    const [token] = await serviceTokens.listServiceTokens();
    output = [];
    await run('list');

    expect(token?.scope).toEqual(['hr.leave', 'hr.payslip']);
    expect(output).toHaveLength(1);
    expect(output[0]).toContain('scope=hr.leave,hr.payslip');
    expect(output[0]).toContain('last_used=never');
  });

  it('prints the usage for an unknown command', async () => {
    await expect(run('explode')).rejects.toMatchObject({ code: 'CLI_COMMAND_UNKNOWN' });
  });

  it('requires the options of a command', async () => {
    await expect(run('rotate')).rejects.toMatchObject({ code: 'CLI_OPTION_MISSING', message: '--token is required.' });
  });

  it('relabels a token and rejects an update with nothing to change', async () => {
    const account = await serviceTokens.createAccount('portal', 'Portal Integration');
    const issued = await serviceTokens.createServiceToken({ accountId: account.id, label: 'primary' });

    await run('update-token', '--token', issued.serviceToken.id, '--label', 'payroll sync', '--note', 'rotated quarterly');
    const [token] = await serviceTokens.listServiceTokens();

    expect(token).toMatchObject({ label: 'payroll sync', note: 'rotated quarterly' });
    expect(output[0]?.endsWith('  payroll sync')).toBe(true);
    await expect(run('update-token', '--token', issued.serviceToken.id)).rejects.toMatchObject({
      code: 'CLI_OPTION_MISSING',
      message: '--label or --note is required.'
    });
  });

  it('lists recent connector calls', async () => {
    await apiLog.record({
      accountId: null,
      serviceTokenId: null,
      endpoint: '/ess/api/leave-types',
      method: 'GET',
      requestIp: '10.0.0.5',
      responseStatusCode: 401,
      message: 'Unauthorized: Missing Bearer token.',
      durationMs: 3
    });

    await run('logs', '--limit', '5');

    expect(output).toHaveLength(1);
    expect(output[0]).toContain('401  GET /ess/api/leave-types  Unauthorized: Missing Bearer token.');
  });
});
