import { ConfigError, ProcessError } from '@findfile/shared';
import { formatError } from './errorReport';

describe('formatError', () => {
  it('includes the exit code and details of a failed search', () => {
    const error = new ProcessError('Search command failed: exit 2', {
      exitCode: 2,
      details: { command: 'find /x/', stderr: 'sort: bad key' },
    });

    expect(formatError(error)).toEqual([
      '❌ Error: Search command failed: exit 2',
      '  Exit code: 2',
      '  Details: {\n  "command": "find /x/",\n  "stderr": "sort: bad key"\n}',
    ]);
  });

  it('prints string details as they are', () => {
    expect(formatError(new ConfigError('Bad config', { details: 'color: invalid' }))).toEqual([
      '❌ Error: Bad config',
      '  Details: color: invalid',
    ]);
  });

  it('reports a plain error by its message alone', () => {
    expect(formatError(new Error('boom'))).toEqual(['❌ Error: boom']);
  });

  it('omits the exit code when the process never ran', () => {
    expect(formatError(new ProcessError('spawn failed'))).toEqual(['❌ Error: spawn failed']);
  });
});
