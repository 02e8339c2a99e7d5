import * as fs from 'fs';
import * as path from 'path';
import { ArtifactWriter, buildViolationRecord, formatCommitDate, recordFileName } from './artifact-writer';
import { createCommit } from '../modules/version-control';
import { RepositoryContext, Violation } from '../types';
import { cleanupTempDirectory, createTempDirectory, createTestFile } from '../../tests/helpers/test-utils';

const HASH_A = 'abcdef1234567890abcdef1234567890abcdef12';

describe('formatCommitDate', () => {
  it('should format as YYYY-MM-DD with zero padding', () => {
    expect(formatCommitDate(new Date(2024, 2, 5, 12))).toBe('2024-03-05');
    expect(formatCommitDate(new Date(2023, 11, 31, 23, 59))).toBe('2023-12-31');
  });
});

describe('recordFileName', () => {
  it('should name records by code and sequence index', () => {
    expect(recordFileName('E501', 1)).toBe('violation_E501_1.json');
  });
});

describe('ArtifactWriter', () => {
  let datasetDir: string;
  let workspaceDir: string;
  let writer: ArtifactWriter;
  let context: RepositoryContext;
  const commit = createCommit(HASH_A, new Date(2024, 2, 5, 12), 'main');

  const violation = (filePath: string, code: string = 'E501', line: number = 10): Violation => ({
    code,
    message: 'line too long',
    filePath,
    line,
  });

  const commitDir = (): string => path.join(datasetDir, 'r', 'abcdef1');

  beforeEach(() => {
    datasetDir = createTempDirectory('lint-miner-dataset-');
    workspaceDir = createTempDirectory('repo_');
    writer = new ArtifactWriter({ rootDir: datasetDir });
    context = {
      source: { cloneUrl: 'https://github.com/octo/r.git', owner: 'octo', name: 'r' },
      workspace: { path: workspaceDir },
      branch: 'main',
    };
  });

  afterEach(() => {
    cleanupTempDirectory(datasetDir);
    cleanupTempDirectory(workspaceDir);
  });

  it('should write one snapshot and one record for a single violation', async () => {
    createTestFile(path.join(workspaceDir, 'x.py'), 'import os\nprint("hello")\n');

    const result = await writer.persist(context, commit, [violation('x.py')]);

    expect(result).toEqual({ written: 1, skipped: [] });
    expect(fs.readdirSync(commitDir()).sort()).toEqual(['violation_E501_1.json', 'x.py']);
    expect(fs.readFileSync(path.join(commitDir(), 'x.py'), 'utf8')).toBe('import os\nprint("hello")\n');

    const raw = fs.readFileSync(path.join(commitDir(), 'violation_E501_1.json'), 'utf8');
    const expected = {
      project_name: 'r',
      owner: 'octo',
      branch: 'main',
      commit_hash: 'abcdef1',
      full_commit_hash: HASH_A,
      commit_date: '2024-03-05',
      file_path_in_repo: 'x.py',
      local_file_name: 'x.py',
      line: 10,
      linter_code: 'E501',
      message: 'line too long',
      repo_url: 'https://github.com/octo/r.git',
    };
    expect(raw).toBe(JSON.stringify(expected, null, 4));
  });

  it('should not touch the filesystem when there are no violations', async () => {
    const result = await writer.persist(context, commit, []);

    expect(result).toEqual({ written: 0, skipped: [] });
    expect(fs.readdirSync(datasetDir)).toEqual([]);
  });

  it('should keep a single snapshot for violations sharing a file', async () => {
    createTestFile(path.join(workspaceDir, 'y.py'), 'x=1 \n');

    const result = await writer.persist(context, commit, [violation('y.py', 'W291', 1), violation('y.py', 'E225', 1)]);

    expect(result.written).toBe(2);
    expect(fs.readdirSync(commitDir()).sort()).toEqual(['violation_E225_2.json', 'violation_W291_1.json', 'y.py']);
  });

  it('should number repeated codes 1..N without collisions', async () => {
    createTestFile(path.join(workspaceDir, 'a.py'), 'a\n');
    createTestFile(path.join(workspaceDir, 'b.py'), 'b\n');

    await writer.persist(context, commit, [
      violation('a.py', 'E501', 1),
      violation('b.py', 'F401', 2),
      violation('a.py', 'E501', 3),
      violation('b.py', 'E501', 4),
    ]);

    expect(fs.readdirSync(commitDir()).sort()).toEqual([
      'a.py',
      'b.py',
      'violation_E501_1.json',
      'violation_E501_3.json',
      'violation_E501_4.json',
      'violation_F401_2.json',
    ]);
  });

  it('should leave an existing snapshot untouched when persisting again', async () => {
    const filePath = path.join(workspaceDir, 'x.py');
    createTestFile(filePath, 'original\n');
    await writer.persist(context, commit, [violation('x.py')]);

    fs.writeFileSync(filePath, 'changed\n');
    await writer.persist(context, commit, [violation('x.py')]);

    expect(fs.readdirSync(commitDir()).sort()).toEqual(['violation_E501_1.json', 'x.py']);
    expect(fs.readFileSync(path.join(commitDir(), 'x.py'), 'utf8')).toBe('original\n');
  });

  it('should snapshot files from subdirectories under their base name', async () => {
    createTestFile(path.join(workspaceDir, 'pkg', 'sub', 'mod.py'), 'pass\n');

    await writer.persist(context, commit, [violation('pkg/sub/mod.py')]);

    const record = JSON.parse(fs.readFileSync(path.join(commitDir(), 'violation_E501_1.json'), 'utf8'));
    expect(record.file_path_in_repo).toBe('pkg/sub/mod.py');
    expect(record.local_file_name).toBe('mod.py');
    expect(fs.readFileSync(path.join(commitDir(), 'mod.py'), 'utf8')).toBe('pass\n');
  });

  it('should skip violations whose file is missing and keep going', async () => {
    createTestFile(path.join(workspaceDir, 'present.py'), 'ok\n');

    const result = await writer.persist(context, commit, [
      violation('gone.py', 'E501', 1),
      violation('../outside.py', 'E501', 2),
      violation('present.py', 'F841', 3),
    ]);

    expect(result.written).toBe(1);
    expect(result.skipped.map(skipped => [skipped.index, skipped.reason])).toEqual([
      [1, 'missing-file'],
      [2, 'missing-file'],
    ]);
    expect(fs.readdirSync(commitDir()).sort()).toEqual(['present.py', 'violation_F841_3.json']);
  });

  it('should treat a directory path as a missing file', async () => {
    fs.mkdirSync(path.join(workspaceDir, 'pkg'));

    const result = await writer.persist(context, commit, [violation('pkg')]);

    expect(result.written).toBe(0);
    expect(result.skipped[0].reason).toBe('missing-file');
  });

  it('should replace malformed UTF-8 instead of failing', async () => {
    fs.writeFileSync(path.join(workspaceDir, 'latin.py'), Buffer.from([0x61, 0xff, 0x62]));

    const result = await writer.persist(context, commit, [violation('latin.py')]);

    expect(result.written).toBe(1);
    expect(fs.readFileSync(path.join(commitDir(), 'latin.py'), 'utf8')).toBe('a\uFFFDb');
  });

  it('should log and skip a record that cannot be written', async () => {
    createTestFile(path.join(workspaceDir, 'x.py'), 'x\n');
    fs.mkdirSync(path.join(commitDir(), 'violation_E501_1.json'), { recursive: true });

    const result = await writer.persist(context, commit, [violation('x.py'), violation('x.py', 'E501', 11)]);

    expect(result.written).toBe(1);
    expect(result.skipped).toEqual([{ violation: violation('x.py'), index: 1, reason: 'record-write-failed' }]);
    expect(fs.existsSync(path.join(commitDir(), 'violation_E501_2.json'))).toBe(true);
  });
});

describe('buildViolationRecord', () => {
  it('should keep the short hash a prefix of the full hash', () => {
    const commit = createCommit(HASH_A, new Date(2024, 0, 1, 12), 'dev');
    const record = buildViolationRecord(
      {
        source: { cloneUrl: 'https://github.com/octo/r.git', owner: 'octo', name: 'r' },
        workspace: { path: '/tmp/ws' },
        branch: 'dev',
      },
      commit,
      { code: 'E501', message: 'm', filePath: 'x.py', line: 3 }
    );

    expect(record.full_commit_hash).toHaveLength(40);
    expect(record.commit_hash).toHaveLength(7);
    expect(record.full_commit_hash.startsWith(record.commit_hash)).toBe(true);
    expect(record.branch).toBe('dev');
  });
});
