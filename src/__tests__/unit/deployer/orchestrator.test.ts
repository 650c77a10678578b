import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { existsSync, mkdirSync, readdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { buildArchive } from '../../../core/deployer/archive-builder.js';
import { deploy } from '../../../core/deployer/orchestrator.js';
import { buildInstallScript, resolveRemoteLayout } from '../../../core/transport/remote-script.js';
import { DeployError } from '../../../core/utils/errors.js';
import type { DeployConfig } from '../../../types/config.js';
import type { DeployReporter, Transport } from '../../../types/deployer.js';
import { makeTempDir, writeTree } from '../../helpers/fs-helpers.js';

class FakeTransport implements Transport {
  readonly uploads: Array<{ localPath: string; remoteDestination: string; existed: boolean }> = [];
  readonly commands: string[] = [];

  constructor(private readonly failOn?: 'upload' | 'execute') {}

  async upload(localPath: string, remoteDestination: string): Promise<void> {
    this.uploads.push({ localPath, remoteDestination, existed: existsSync(localPath) });
    if (this.failOn === 'upload') {
      throw new DeployError('transport', 'Upload failed: scp exited with code 1');
    }
  }

  async execute(command: string): Promise<void> {
    this.commands.push(command);
    if (this.failOn === 'execute') {
      throw new DeployError('transport', 'Remote command failed: ssh exited with code 1');
    }
  }
}

class RecordingReporter implements DeployReporter {
  readonly steps: string[] = [];
  readonly messages: string[] = [];
  readonly tasks: string[] = [];

  step(index: number, total: number, message: string): void {
    this.steps.push(`[${index}/${total}] ${message}`);
  }

  info(message: string): void {
    this.messages.push(message);
  }

  success(message: string): void {
    this.messages.push(message);
  }

  verbose(): void {
    // not recorded
  }

  task<T>(message: string, run: () => Promise<T>): Promise<T> {
    this.tasks.push(message);
    return run();
  }
}

const noTools = async (): Promise<void> => undefined;

describe('Deployment Orchestrator', () => {
  let testDir: string;
  let archiveTmp: string;
  let config: DeployConfig;

  beforeEach(() => {
    testDir = makeTempDir('venus-orchestrator-');
    archiveTmp = join(testDir, 'tmp');
    mkdirSync(archiveTmp);

    writeTree(join(testDir, 'proj'), {
      '.git/config': '[core]',
      'app.py': 'print("hi")',
      'app.pyc': 'bytecode',
    });

    config = {
      host: 'root@192.0.2.10',
      remotePath: '/data/apps/proj',
      sourceDir: join(testDir, 'proj'),
      skipBackup: false,
    };
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it('should upload the archive and run the install script with a backup', async () => {
    const transport = new FakeTransport();

    const result = await deploy(
      config,
      { transport, ensureTools: noTools },
      { archive: { tempDir: archiveTmp } }
    );

    expect(transport.uploads).toHaveLength(1);
    expect(transport.uploads[0]).toMatchObject({
      remoteDestination: '/tmp/proj-deploy.tar.gz',
      existed: true,
    });
    expect(transport.commands).toEqual([
      buildInstallScript(resolveRemoteLayout('/data/apps/proj'), { backup: true }),
    ]);
    expect(result).toMatchObject({
      archive: { rootName: 'proj', entries: 2, files: 1 },
      remoteArchive: '/tmp/proj-deploy.tar.gz',
      backupRequested: true,
      dryRun: false,
    });
  });

  it('should delete the local archive after a successful run', async () => {
    const transport = new FakeTransport();

    await deploy(config, { transport, ensureTools: noTools }, { archive: { tempDir: archiveTmp } });

    expect(existsSync(transport.uploads[0].localPath)).toBe(false);
    expect(readdirSync(archiveTmp)).toEqual([]);
  });

  it('should leave the backup out when skipBackup is set', async () => {
    const transport = new FakeTransport();
    const reporter = new RecordingReporter();

    const result = await deploy(
      { ...config, skipBackup: true },
      { transport, ensureTools: noTools, reporter },
      { archive: { tempDir: archiveTmp } }
    );

    expect(transport.commands).toEqual([
      buildInstallScript(resolveRemoteLayout('/data/apps/proj'), { backup: false }),
    ]);
    expect(transport.commands[0]).not.toContain('backup');
    expect(result.backupRequested).toBe(false);
    expect(reporter.steps[reporter.steps.length - 1]).toBe('[4/4] Done. No backup performed.');
  });

  it('should report every step in order', async () => {
    const reporter = new RecordingReporter();

    await deploy(
      config,
      { transport: new FakeTransport(), ensureTools: noTools, reporter },
      { archive: { tempDir: archiveTmp } }
    );

    expect(reporter.steps).toEqual([
      `[1/4] Packaging ${join(testDir, 'proj')}`,
      '[2/4] Uploading archive to root@192.0.2.10:/tmp/proj-deploy.tar.gz',
      '[3/4] Deploying to root@192.0.2.10:/data/apps/proj',
      '[4/4] Done. Previous install (if any) backed up with timestamp suffix.',
    ]);
    expect(reporter.tasks).toEqual(['Creating archive of proj']);
  });

  it('should stop before archiving when a tool is missing', async () => {
    const transport = new FakeTransport();
    const build = jest.fn(buildArchive);

    await expect(
      deploy(config, {
        transport,
        ensureTools: async () => {
          throw new DeployError('environment', 'Missing required commands: scp');
        },
        buildArchive: build,
      })
    ).rejects.toMatchObject({ kind: 'environment' });

    expect(build).not.toHaveBeenCalled();
    expect(transport.uploads).toEqual([]);
    expect(transport.commands).toEqual([]);
  });

  it('should stop before archiving when the source is missing', async () => {
    const transport = new FakeTransport();
    const build = jest.fn(buildArchive);

    await expect(
      deploy(
        { ...config, sourceDir: join(testDir, 'missing') },
        { transport, ensureTools: noTools, buildArchive: build }
      )
    ).rejects.toThrow(`Source directory not found: ${join(testDir, 'missing')}`);

    expect(build).not.toHaveBeenCalled();
    expect(transport.uploads).toEqual([]);
  });

  it('should reject a source whose name differs from the remote directory', async () => {
    const transport = new FakeTransport();

    await expect(
      deploy({ ...config, remotePath: '/data/apps/other' }, { transport, ensureTools: noTools })
    ).rejects.toThrow('Source directory name "proj" does not match remote directory name "other"');

    expect(transport.uploads).toEqual([]);
  });

  it('should not run the remote command and clean up when the upload fails', async () => {
    const transport = new FakeTransport('upload');

    await expect(
      deploy(config, { transport, ensureTools: noTools }, { archive: { tempDir: archiveTmp } })
    ).rejects.toMatchObject({ kind: 'transport' });

    expect(transport.commands).toEqual([]);
    expect(existsSync(transport.uploads[0].localPath)).toBe(false);
    expect(readdirSync(archiveTmp)).toEqual([]);
  });

  it('should clean up when the remote command fails', async () => {
    const transport = new FakeTransport('execute');

    await expect(
      deploy(config, { transport, ensureTools: noTools }, { archive: { tempDir: archiveTmp } })
    ).rejects.toThrow('Remote command failed: ssh exited with code 1');

    expect(transport.commands).toHaveLength(1);
    expect(readdirSync(archiveTmp)).toEqual([]);
  });

  it('should only build the archive in a dry run', async () => {
    const transport = new FakeTransport();
    const reporter = new RecordingReporter();

    const result = await deploy(
      config,
      { transport, ensureTools: noTools, reporter },
      { dryRun: true, archive: { tempDir: archiveTmp } }
    );

    expect(transport.uploads).toEqual([]);
    expect(transport.commands).toEqual([]);
    expect(result.dryRun).toBe(true);
    expect(result.script).toBe(
      buildInstallScript(resolveRemoteLayout('/data/apps/proj'), { backup: true })
    );
    expect(reporter.messages).toContain(
      'Dry run: would upload to root@192.0.2.10:/tmp/proj-deploy.tar.gz'
    );
    expect(readdirSync(archiveTmp)).toEqual([]);
  });
});
