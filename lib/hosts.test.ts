import { beforeEach, describe, expect, it, jest } from '@jest/globals';

jest.mock('node:fs', () => ({
  readFileSync: jest.fn()
}));

function mockReadFileSync(): jest.Mock {
  const { readFileSync } = jest.requireMock('node:fs') as {
    readFileSync: jest.Mock;
  };
  return readFileSync;
}

async function loadHosts() {
  return await import('./hosts');
}

function errnoError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('parseHostList', () => {
  it('skips blank lines and comments, keeping order and duplicates', async () => {
    const { parseHostList } = await loadHosts();

    expect(parseHostList('a.test\n\n# edge routers\n  b.test  \r\na.test\n')).toEqual([
      'a.test',
      'b.test',
      'a.test'
    ]);
  });
});

describe('readHostFile', () => {
  beforeEach(() => {
    jest.resetModules();
    jest.clearAllMocks();
  });

  it('reads hosts from the file', async () => {
    const readFileSync = mockReadFileSync();
    readFileSync.mockReturnValue('192.0.2.1\n# lab\n192.0.2.2\n');

    const { readHostFile } = await loadHosts();

    expect(readHostFile('hosts.txt')).toEqual({ hosts: ['192.0.2.1', '192.0.2.2'] });
    expect(readFileSync).toHaveBeenCalledWith('hosts.txt', 'utf8');
  });

  it('reports a missing file', async () => {
    mockReadFileSync().mockImplementation(() => {
      throw errnoError('no such file', 'ENOENT');
    });

    const { readHostFile } = await loadHosts();

    expect(readHostFile('missing.txt')).toEqual({
      hosts: [],
      error: "Input file 'missing.txt' not found."
    });
  });

  it('reports a permission error', async () => {
    mockReadFileSync().mockImplementation(() => {
      throw errnoError('permission denied', 'EACCES');
    });

    const { readHostFile } = await loadHosts();

    expect(readHostFile('locked.txt')).toEqual({
      hosts: [],
      error: "Permission denied reading file 'locked.txt'."
    });
  });

  it('reports any other read error with its message', async () => {
    mockReadFileSync().mockImplementation(() => {
      throw errnoError('is a directory', 'EISDIR');
    });

    const { readHostFile } = await loadHosts();

    expect(readHostFile('dir')).toEqual({
      hosts: [],
      error: "Error reading input file 'dir': is a directory"
    });
  });
});
