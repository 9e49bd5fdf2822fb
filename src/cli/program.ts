import { Command } from 'commander';
import { loadConfig } from '../config/index.js';
import { getLogger } from '../utils/logging.js';
import { TokenService } from '../services/tokenService.js';
import { buildServer } from '../api/server.js';

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
  setExitCode: (code: number) => void;
}

const defaultIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

function apiBase(): string {
  return process.env.API_BASE || 'http://localhost:3000';
}

async function callApi(method: 'GET' | 'POST', route: string, body?: unknown): Promise<unknown> {
  const res = await fetch(new URL(route, apiBase()), {
    method,
    headers: body === undefined ? undefined : { 'content-type': 'application/json' },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
  const parsed: unknown = await res.json();
  if (!res.ok) {
    throw new Error(`API responded ${res.status}: ${JSON.stringify(parsed)}`);
  }
  return parsed;
}

// Whole positive numbers only ("5abc", "1.9" and "abc" are rejected)
function parsePositiveInteger(raw: string): number | null {
  const value = Number(raw);
  return raw.trim() !== '' && Number.isSafeInteger(value) && value > 0 ? value : null;
}

function isValidResult(value: unknown): value is { valid: boolean } {
  return typeof value === 'object' && value !== null && 'valid' in value;
}

export function buildProgram(io: CliIO = defaultIO): Command {
  const program = new Command();

  program
    .name('csrf-tokens')
    .description('Issue and verify single-use anti-forgery tokens')
    .version('0.1.0');

  program
    .command('serve')
    .option('-p, --port <n>', 'Port to listen on (defaults to config server.port)')
    .description('Start the HTTP host with one in-memory token registry')
    .action(async (opts: { port?: string }) => {
      const cfg = loadConfig();
      let port = cfg.server.port;
      if (opts.port !== undefined) {
        const parsed = parsePositiveInteger(opts.port);
        if (parsed === null || parsed > 65535) {
          io.err('--port must be an integer between 1 and 65535');
          io.setExitCode(2);
          return;
        }
        port = parsed;
      }
      const server = await buildServer();
      await server.listen({ port, host: cfg.server.host });
      getLogger().info({ port }, 'Server started');
    });

  program
    .command('generate')
    .option('-c, --count <n>', 'Number of tokens to generate', '1')
    .option('-e, --entropy <bytes>', 'Random bytes per token (defaults to config)')
    .description('Generate tokens in a local registry and print them as JSON')
    .action((opts: { count: string; entropy?: string }) => {
      const count = parsePositiveInteger(opts.count);
      if (count === null) {
        io.err('--count must be a positive integer');
        io.setExitCode(2);
        return;
      }
      let entropy: number | undefined;
      if (opts.entropy !== undefined) {
        const parsed = parsePositiveInteger(opts.entropy);
        if (parsed === null) {
          io.err('--entropy must be a positive integer');
          io.setExitCode(2);
          return;
        }
        entropy = parsed;
      }
      const service = new TokenService();
      const tokens: string[] = [];
      for (let i = 0; i < count; i++) {
        tokens.push(service.issue(entropy).token);
      }
      const stats = service.stats();
      // Only the newest maxTokens remain registered; older ones were evicted
      io.out(JSON.stringify({ tokens, size: stats.size, maxTokens: stats.maxTokens }, null, 2));
    });

  program
    .command('verify')
    .requiredOption('--token <token>', 'Token to verify against a running server')
    .option('--keep', 'Do not consume the token on success', false)
    .description('Verify a token via the HTTP API (API_BASE, default http://localhost:3000)')
    .action(async (opts: { token: string; keep: boolean }) => {
      const result = await callApi('POST', '/v1/tokens/verify', {
        token: opts.token,
        remove: !opts.keep,
      });
      io.out(JSON.stringify(result, null, 2));
      if (!isValidResult(result) || !result.valid) io.setExitCode(2);
    });

  program
    .command('stats')
    .description('Show registry size and configuration of a running server')
    .action(async () => {
      const result = await callApi('GET', '/v1/tokens/stats');
      io.out(JSON.stringify(result, null, 2));
    });

  return program;
}
