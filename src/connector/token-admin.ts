import { parseArgs } from 'node:util';

import { AppError } from '../errors/app-error.js';
import type { ServiceTokenRecord } from '../repositories/service-token-repository.js';
import type { ApiLogService } from '../services/api-log-service.js';
import type { ServiceTokenService } from '../services/service-token-service.js';

export const TOKEN_ADMIN_USAGE = [
  'Usage: token-admin <command> [options]',
  '',
  'Commands:',
  '  create-account --login <login> --name <name>',
  '  disable-account --account <id>',
  '  enable-account --account <id>',
  '  create-token --account <id> --label <label> [--scope <kind,kind>] [--note <text>]',
  '  rotate --token <id>',
  '  toggle --token <id>',
  '  set-scope --token <id> --scope <kind,kind>   (empty scope grants every resource)',
  '  update-token --token <id> [--label <label>] [--note <text>]',
  '  list',
  '  logs [--limit <n>]'
].join('\n');

export interface TokenAdminServices {
  serviceTokens: ServiceTokenService;
  apiLog: ApiLogService;
}

export type OutputWriter = (line: string) => void;

function requireOption(value: string | undefined, name: string): string {
  if (value === undefined || value.trim().length === 0) {
    throw new AppError(400, 'CLI_OPTION_MISSING', `--${name} is required.`);
  }

  return value;
}

function splitScope(value: string | undefined): string[] {
  return value === undefined ? [] : value.split(',');
}

function describeToken(token: ServiceTokenRecord): string {
  const scope = token.scope.length === 0 ? '*' : token.scope.join(',');
  const lastUsed = token.lastUsedAt === null ? 'never' : token.lastUsedAt.toISOString();
  return `${token.id}  ${token.tokenPrefix}…  ${token.isActive ? 'active' : 'inactive'}  scope=${scope}  last_used=${lastUsed}  ${token.label}`;
}

/** Executes one service-token administration command and writes its result lines. */
export async function runTokenAdminCommand(
  argv: readonly string[],
  services: TokenAdminServices,
  write: OutputWriter
): Promise<void> {
  const { positionals, values } = parseArgs({
    args: [...argv],
    allowPositionals: true,
    options: {
      login: { type: 'string' },
      name: { type: 'string' },
      account: { type: 'string' },
      label: { type: 'string' },
      scope: { type: 'string' },
      note: { type: 'string' },
      token: { type: 'string' },
      limit: { type: 'string' }
    }
  });

  const [command] = positionals;

  switch (command) {
    case 'create-account': {
      const account = await services.serviceTokens.createAccount(
        requireOption(values.login, 'login'),
        requireOption(values.name, 'name')
      );
      write(`Created connector account ${account.id} (${account.login}).`);
      return;
    }
    case 'disable-account':
    case 'enable-account': {
      const account = await services.serviceTokens.setAccountActive(
        requireOption(values.account, 'account'),
        command === 'enable-account'
      );
      write(`Connector account ${account.id} is now ${account.isActive ? 'active' : 'inactive'}.`);
      return;
    }
    case 'create-token': {
      const issued = await services.serviceTokens.createServiceToken({
        accountId: requireOption(values.account, 'account'),
        label: requireOption(values.label, 'label'),
        scope: splitScope(values.scope),
        note: values.note ?? null
      });
      write(`Created service token ${issued.serviceToken.id}.`);
      write(`Token (shown once): ${issued.token}`);
      return;
    }
    case 'rotate': {
      const issued = await services.serviceTokens.rotateServiceToken(requireOption(values.token, 'token'));
      write(`Rotated service token ${issued.serviceToken.id}.`);
      write(`Token (shown once): ${issued.token}`);
      return;
    }
    case 'toggle': {
      const token = await services.serviceTokens.toggleActive(requireOption(values.token, 'token'));
      write(`Service token ${token.id} is now ${token.isActive ? 'active' : 'inactive'}.`);
      return;
    }
    case 'set-scope': {
      const token = await services.serviceTokens.setScope(requireOption(values.token, 'token'), splitScope(values.scope));
      write(describeToken(token));
      return;
    }
    case 'update-token': {
      const serviceTokenId = requireOption(values.token, 'token');
      if (values.label === undefined && values.note === undefined) {
        throw new AppError(400, 'CLI_OPTION_MISSING', '--label or --note is required.');
      }

      const token = await services.serviceTokens.updateDetails(serviceTokenId, {
        label: values.label,
        note: values.note
      });
      write(describeToken(token));
      return;
    }
    case 'list': {
      const tokens = await services.serviceTokens.listServiceTokens();
      if (tokens.length === 0) {
        write('No service tokens.');
        return;
      }

      for (const token of tokens) {
        write(describeToken(token));
      }
      return;
    }
    case 'logs': {
      const limit = values.limit === undefined ? 50 : Number.parseInt(values.limit, 10);
      if (!Number.isInteger(limit) || limit <= 0) {
        throw new AppError(400, 'CLI_OPTION_INVALID', '--limit must be a positive integer.');
      }

      for (const entry of await services.apiLog.listRecent(limit)) {
        write(`${entry.createdAt.toISOString()}  ${entry.responseStatusCode}  ${entry.method} ${entry.endpoint}  ${entry.message}`);
      }
      return;
    }
    default:
      throw new AppError(400, 'CLI_COMMAND_UNKNOWN', TOKEN_ADMIN_USAGE);
  }
}
