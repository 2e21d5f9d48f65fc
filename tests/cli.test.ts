import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { redactCommand } from '../src/commands/redact';

const mockExit = () => vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);

describe('redact command', () => {
  let tempDir: string;
  let output: string;
  let exitSpy: ReturnType<typeof mockExit>;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'url-redact-cli-'));
    output = path.join(tempDir, 'out.log');
    exitSpy = mockExit();
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  // Commander keeps option values between parses, so every call passes the same flags
  const run = (input: string) =>
    redactCommand.parseAsync(['node', 'url-redact', input, '-o', output, '-l', 'ERROR', '-p', 'api_key,token']);

  it('should redact the input file into the output file', async () => {
    const input = path.join(tempDir, 'in.log');
    await fs.writeFile(input, 'GET https://api.example.com/v1/items?token=abc&page=2 200\n');

    await run(input);

    expect(await fs.readFile(output, 'utf8')).toBe('GET https://api.example.com/v1/items?token=REDACTED&page=2 200\n');
    expect(exitSpy).not.toHaveBeenCalled();
  });

  it('should exit with 1 when the input file is missing', async () => {
    await run(path.join(tempDir, 'missing.log'));

    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it('should describe the original option names in help', () => {
    const help = redactCommand.helpInformation();

    expect(help).toContain('-p, --parameters <list>');
    expect(help).toContain('-r, --redaction_string <token>');
    expect(help).toContain('-l, --log_level <level>');
    expect(help).toContain('-o, --output <path>');
  });
});
