import { CliLogger, resolveLogLevels } from './cli-logger';

describe('resolveLogLevels', () => {
  it('defaults to log and above', () => {
    expect(resolveLogLevels(undefined)).toEqual(['fatal', 'error', 'warn', 'log']);
  });

  it('honours LOG_LEVEL case-insensitively', () => {
    expect(resolveLogLevels('WARN')).toEqual(['fatal', 'error', 'warn']);
    expect(resolveLogLevels('debug')).toEqual(['fatal', 'error', 'warn', 'log', 'debug']);
  });

  it('treats an unknown level as log', () => {
    expect(resolveLogLevels('chatty')).toEqual(['fatal', 'error', 'warn', 'log']);
  });

  it('enables everything with --verbose', () => {
    expect(resolveLogLevels('error', { verbose: true })).toEqual(['fatal', 'error', 'warn', 'log', 'debug', 'verbose']);
  });

  it('lets --quiet win over --verbose', () => {
    expect(resolveLogLevels('verbose', { verbose: true, quiet: true })).toEqual(['fatal', 'error']);
  });
});

describe('CliLogger', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('writes informational lines to stderr', () => {
    const stderr = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const stdout = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);

    new CliLogger('txpool', { logLevels: ['log'] }).log('Connected to Base (Chain ID: 8453)');

    expect(stderr).toHaveBeenCalledWith(expect.stringContaining('Connected to Base (Chain ID: 8453)'));
    expect(stdout).not.toHaveBeenCalled();
  });

  it('drops levels that are not enabled', () => {
    const stderr = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);

    new CliLogger('txpool', { logLevels: ['error'] }).warn('ignored');

    expect(stderr).not.toHaveBeenCalled();
  });
});
