import { ScriptedTerminal } from '../../../test/fakes/scripted-terminal';
import { DEFAULT_CONNECTION_PARAMETERS } from '../constants/connection-defaults';
import { InvalidPortError } from '../errors/dictionary.errors';
import { ConfigResolverService } from './config-resolver.service';
import { LoginService } from './login.service';

const RESOLVED = Object.freeze({
  host: 'db.internal',
  port: 3307,
  user: 'editor',
  password: 'test-secret',
  database: 'lexicon',
  authMode: 'caching_sha2_password',
});

function createLogin(answers: string[]): { login: LoginService; terminal: ScriptedTerminal } {
  const terminal = new ScriptedTerminal(answers);
  const resolver = new ConfigResolverService(DEFAULT_CONNECTION_PARAMETERS, terminal);
  return { login: new LoginService(resolver, terminal), terminal };
}

describe('LoginService', () => {
  describe('prompt mode', () => {
    it('keeps resolved values for blank answers', async () => {
      const { login, terminal } = createLogin(['', '', '', '']);

      await expect(login.login(RESOLVED, 'prompt')).resolves.toEqual(RESOLVED);
      expect(terminal.questions).toEqual([
        'What host to connect to (db.internal): ',
        'What port to connect to (3307): ',
        'What user to connect to (editor): ',
      ]);
      expect(terminal.hiddenQuestions).toEqual(['What password to connect with: ']);
    });

    it('overrides with typed answers and coerces the port', async () => {
      const { login } = createLogin(['localhost', ' 3308 ', 'root', 'other-secret']);

      await expect(login.login(RESOLVED, 'prompt')).resolves.toEqual({
        ...RESOLVED,
        host: 'localhost',
        port: 3308,
        user: 'root',
        password: 'other-secret',
      });
    });

    it('rejects a typed port that is not a number', async () => {
      const { login } = createLogin(['', 'mysql', '', '']);

      await expect(login.login(RESOLVED, 'prompt')).rejects.toBeInstanceOf(InvalidPortError);
    });
  });

  describe('auto mode', () => {
    it('shows the resolved values and only asks for the password', async () => {
      const { login, terminal } = createLogin(['other-secret']);

      await expect(login.login(RESOLVED, 'auto')).resolves.toEqual({
        ...RESOLVED,
        password: 'other-secret',
      });
      expect(terminal.lines).toEqual([
        'What host to connect to: db.internal',
        'What port to connect to: 3307',
        'What user to connect to: editor',
      ]);
      expect(terminal.questions).toEqual([]);
    });
  });

  describe('none mode', () => {
    it('returns the resolved parameters without asking', async () => {
      const { login, terminal } = createLogin([]);

      await expect(login.login(RESOLVED, 'none')).resolves.toBe(RESOLVED);
      expect(terminal.hiddenQuestions).toEqual([]);
    });
  });
});
