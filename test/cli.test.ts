import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { run } from '../src/cli.js';
import { SendError } from '../src/errors.js';
import { SeenStore } from '../src/store.js';
import type { DigestMessage, Mailer } from '../src/emailer.js';
import type { SourceFetcher } from '../src/fetcher.js';
import type { RunStatus } from '../src/types.js';

describe('run', () => {
  let dir: string;
  let configPath: string;
  let statusPath: string;
  let storePath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'digest-cli-'));
    configPath = join(dir, 'config.yaml');
    statusPath = join(dir, 'out', 'status.json');
    storePath = join(dir, 'state', 'seen.sqlite3');
    writeFileSync(
      configPath,
      [
        'sources:',
        '  - name: Example',
        '    url: https://www.example.com/rent',
        'email:',
        '  fromEmail: digest@example.com',
        '  toEmails: [me@example.com]',
        'store:',
        `  path: ${JSON.stringify(storePath)}`,
      ].join('\n'),
    );
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function readStatus(): RunStatus {
    const status: RunStatus = JSON.parse(readFileSync(statusPath, 'utf-8'));
    return status;
  }

  const oneListing: SourceFetcher = async (source) => ({
    source,
    listings: [{ url: 'https://www.example.com/item/1', text: '3 rooms', source: source.name }],
  });

  const nothing: SourceFetcher = async (source) => ({ source, listings: [] });

  function mailer(
    send: (message: DigestMessage) => Promise<string>,
  ): Mailer & { send: Mock<(message: DigestMessage) => Promise<string>> } {
    return { send: vi.fn(send) };
  }

  it('exits 0 and records the delivered listing after a successful send', async () => {
    const ok = mailer(async () => 'message-1');

    const code = await run(['--config', configPath], { statusPath, fetchSource: oneListing, mailer: ok });

    expect(code).toBe(0);
    expect(ok.send).toHaveBeenCalledTimes(1);
    expect(readStatus()).toMatchObject({ success: true, phase: 'DONE', listingsNew: 1, emailSent: true });
    const store = SeenStore.open(storePath);
    expect(store.contains('https://www.example.com/item/1')).toBe(true);
    store.close();
  });

  it('exits 0 without sending when there is nothing new', async () => {
    const ok = mailer(async () => 'message-1');

    const code = await run(['--config', configPath], { statusPath, fetchSource: nothing, mailer: ok });

    expect(code).toBe(0);
    expect(ok.send).not.toHaveBeenCalled();
    expect(readStatus()).toMatchObject({ success: true, listingsNew: 0, emailSent: false });
  });

  it('exits 1 and keeps the history empty when the send fails', async () => {
    const failing = mailer(async () => {
      throw new SendError('SMTP send failed: connection refused');
    });

    const code = await run(['--config', configPath], { statusPath, fetchSource: oneListing, mailer: failing });

    expect(code).toBe(1);
    expect(readStatus()).toMatchObject({
      success: false,
      phase: 'FAILED',
      errors: ['SMTP send failed: connection refused'],
    });
    const store = SeenStore.open(storePath);
    expect(store.size).toBe(0);
    store.close();
  });

  it('exits 1 when the config file is missing', async () => {
    const absent = join(dir, 'absent.yaml');

    const code = await run(['--config', absent], { statusPath, fetchSource: oneListing });

    expect(code).toBe(1);
    expect(readStatus()).toMatchObject({ success: false, errors: [`Config file not found: ${absent}`] });
  });

  it('exits 1 when the mail secret is not set, before fetching', async () => {
    const fetchSource = vi.fn(oneListing);

    const code = await run(['--config', configPath], { statusPath, fetchSource, env: {} });

    expect(code).toBe(1);
    expect(fetchSource).not.toHaveBeenCalled();
    expect(readStatus().errors).toEqual(['GMAIL_APP_PASSWORD not set — cannot send email']);
  });

  it('rejects --config without a value', async () => {
    expect(await run(['--config'], { statusPath })).toBe(1);
    expect(readStatus().errors).toEqual(['Missing value for --config']);

    expect(await run(['--config', '--dry-run'], { statusPath })).toBe(1);
    expect(readStatus().errors).toEqual(['Missing value for --config']);
  });

  it('exits 0 on --validate without running or writing a status', async () => {
    const fetchSource = vi.fn(oneListing);

    const code = await run(['--config', configPath, '--validate'], { statusPath, fetchSource });

    expect(code).toBe(0);
    expect(fetchSource).not.toHaveBeenCalled();
    expect(existsSync(statusPath)).toBe(false);
  });
});
