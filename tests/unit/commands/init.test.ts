import { describe, it, expect, vi, beforeEach } from 'vitest';
import fs from 'node:fs';
import { initCommand } from '@/commands/init';
import { DEFAULT_CONFIG_TEMPLATE } from '@/config/defaults';
import { logger } from '@/utils/logger';

vi.mock('node:fs');

const mockExit = () => vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);
const spyLog = (level: 'info' | 'error') => vi.spyOn(logger, level).mockImplementation(() => undefined);

describe('init command', () => {
  let exitSpy: ReturnType<typeof mockExit>;
  let infoSpy: ReturnType<typeof spyLog>;
  let errorSpy: ReturnType<typeof spyLog>;

  beforeEach(() => {
    vi.mocked(fs.writeFileSync).mockReset();
    exitSpy = mockExit();
    infoSpy = spyLog('info');
    errorSpy = spyLog('error');
  });

  it('should create url-redact.yaml in the working directory without overwriting', async () => {
    await initCommand.parseAsync(['node', 'test']);

    expect(fs.writeFileSync).toHaveBeenCalledWith(
      expect.stringMatching(/url-redact\.yaml$/),
      DEFAULT_CONFIG_TEMPLATE,
      { encoding: 'utf8', flag: 'wx' }
    );
    expect(infoSpy).toHaveBeenCalledWith(expect.stringMatching(/^Created .*url-redact\.yaml$/));
    expect(exitSpy).not.toHaveBeenCalled();
  });

  it('should exit with 1 if url-redact.yaml already exists', async () => {
    vi.mocked(fs.writeFileSync).mockImplementation(() => {
      throw Object.assign(new Error('EEXIST: file already exists'), { code: 'EEXIST' });
    });

    await initCommand.parseAsync(['node', 'test']);

    expect(errorSpy).toHaveBeenCalledWith(expect.stringMatching(/url-redact\.yaml already exists$/));
    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it('should exit with 1 if writing fails', async () => {
    vi.mocked(fs.writeFileSync).mockImplementation(() => {
      throw new Error('Write failed');
    });

    await initCommand.parseAsync(['node', 'test']);

    expect(errorSpy).toHaveBeenCalledWith(expect.stringMatching(/^Failed to create .*url-redact\.yaml: Write failed$/));
    expect(exitSpy).toHaveBeenCalledWith(1);
    expect(infoSpy).not.toHaveBeenCalled();
  });
});
