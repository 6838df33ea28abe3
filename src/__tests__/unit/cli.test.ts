import { buildProgram } from '../../cli';
import { EnvCredentialProvider } from '../../services/envCredentials';

const env = {
  PORTAL_LOGIN: 'teacher@example.test',
  PORTAL_PASSWORD: 'test-secret',
  PORTAL_LOGIN_LYCEUM2: 'second@example.test',
  PORTAL_PASSWORD_LYCEUM2: 'test-secret',
};

describe('CLI', () => {
  let printed: string[];
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    printed = [];
    logSpy = jest.spyOn(console, 'log').mockImplementation((line: unknown) => {
      printed.push(String(line));
    });
  });

  afterEach(() => {
    logSpy.mockRestore();
  });

  it('lists the configured credential references', async () => {
    const program = buildProgram(new EnvCredentialProvider(env));

    await program.parseAsync(['node', 'gradebook-scrape', 'credentials']);

    expect(printed).toEqual(['default', 'lyceum2']);
  });

  it('prints nothing when no login is configured', async () => {
    const program = buildProgram(new EnvCredentialProvider({}));

    await program.parseAsync(['node', 'gradebook-scrape', 'credentials']);

    expect(printed).toEqual([]);
  });

  it('refuses a run with an unknown credential reference', async () => {
    const program = buildProgram(new EnvCredentialProvider(env));

    await expect(
      program.parseAsync(['node', 'gradebook-scrape', 'run', '411', '2', '--school', '17', '--credential', 'school9']),
    ).rejects.toThrow('Unknown credential reference "school9"; configured: default, lyceum2');
  });
});
