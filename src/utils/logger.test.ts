import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Logger } from './logger';

describe('Logger', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'lint-miner-log-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should write entries at or above the configured level with context and metadata', () => {
    const logFilePath = path.join(tempDir, 'nested', 'miner.log');
    const logger = new Logger({ level: 'warn', enableConsole: false, enableFile: true, logFilePath });

    const child = logger.child('MiningPipeline');
    child.info('not written');
    child.warn('Checkout failed', { commit: 'abcdef1' });

    const lines = fs.readFileSync(logFilePath, 'utf8').trim().split('\n');
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\S+ \[WARN\] \[MiningPipeline\] Checkout failed \{"commit":"abcdef1"\}$/);
  });

  it('should nest child contexts', () => {
    const logger = new Logger({ level: 'debug', enableConsole: false, enableFile: false, context: 'Miner' });
    const formatted = logger.child('Git').formatLogEntry({
      timestamp: '2024-01-01T00:00:00.000Z',
      level: 'info',
      message: 'hello',
      context: 'Miner:Git',
    });

    expect(formatted).toBe('2024-01-01T00:00:00.000Z [INFO] [Miner:Git] hello');
  });

  it('should replace circular references in metadata', () => {
    const logger = new Logger({ level: 'debug', enableConsole: false, enableFile: false });
    const circular: Record<string, unknown> = { name: 'loop' };
    circular.self = circular;

    const formatted = logger.formatLogEntry({
      timestamp: 't',
      level: 'error',
      message: 'm',
      metadata: circular,
    });

    expect(formatted).toBe('t [ERROR] m {"name":"loop","self":"[Circular Reference]"}');
  });

  it('should merge bound fields with call metadata', () => {
    const logFilePath = path.join(tempDir, 'fields.log');
    const logger = new Logger({ level: 'info', enableConsole: false, enableFile: true, logFilePath, context: 'MiningPipeline' });

    logger
      .withFields({ repository: 'octo/demo' })
      .withFields({ commit: 'abcdef1' })
      .info('Analyzing commit', { date: '2024-03-05' });

    const line = fs.readFileSync(logFilePath, 'utf8').trim();
    expect(line).toMatch(
      /^\S+ \[INFO\] \[MiningPipeline\] Analyzing commit \{"repository":"octo\/demo","commit":"abcdef1","date":"2024-03-05"\}$/
    );
  });

  it('should omit the metadata suffix when there is nothing to show', () => {
    const logger = new Logger({ level: 'debug', enableConsole: false, enableFile: false });

    expect(logger.formatLogEntry({ timestamp: 't', level: 'warn', message: 'm', metadata: {} })).toBe('t [WARN] m');
  });

  it('should report the elapsed time of an operation', () => {
    const logFilePath = path.join(tempDir, 'operation.log');
    const logger = new Logger({ level: 'info', enableConsole: false, enableFile: true, logFilePath });

    const finish = logger.operation('Mining 2 repositories');
    const duration = finish({ failed: 1 });

    expect(duration).toBeGreaterThanOrEqual(0);
    const lines = fs.readFileSync(logFilePath, 'utf8').trim().split('\n');
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain(`Finished: Mining 2 repositories {"failed":1,"duration":"${duration}ms"}`);
  });
});
