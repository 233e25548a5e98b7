import { checkToolArguments } from '../argument-policy';
import { loadTestPolicy } from '../../__tests__/fixtures';

const HOME = '/home/tester';

describe('checkToolArguments', () => {
  const { tools } = loadTestPolicy();

  describe('paths', () => {
    it('should allow paths under an allowed pattern', () => {
      expect(checkToolArguments(tools.read_file, { path: '/tmp/notes.txt' }, HOME)).toBeUndefined();
      expect(checkToolArguments(tools.read_file, { path: '$HOME/projects/a.md' }, HOME)).toBeUndefined();
      expect(checkToolArguments(tools.read_file, { path: '~/a.md' }, HOME)).toBeUndefined();
    });

    it('should deny forbidden paths even inside allowed ones', () => {
      expect(checkToolArguments(tools.read_file, { path: '/home/tester/.ssh/id_ed25519' }, HOME)).toBe(
        "Path '/home/tester/.ssh/id_ed25519' matches a forbidden pattern",
      );
      expect(checkToolArguments(tools.read_file, { path: '/tmp/server.pem' }, HOME)).toBe(
        "Path '/tmp/server.pem' matches a forbidden pattern",
      );
    });

    it('should resolve traversal before matching', () => {
      expect(checkToolArguments(tools.read_file, { path: '/tmp/../etc/passwd' }, HOME)).toBe(
        "Path '/etc/passwd' is outside the allowed paths",
      );
    });

    it('should check every path-like argument', () => {
      expect(checkToolArguments(tools.list_directory, { directory: '/srv/.ssh/keys' }, HOME)).toBe(
        "Path '/srv/.ssh/keys' matches a forbidden pattern",
      );
    });

    it('should accept any path when the tool lists no allowed paths', () => {
      expect(checkToolArguments(tools.list_directory, { path: '/var/log' }, HOME)).toBeUndefined();
    });
  });

  describe('commands', () => {
    it('should allow listed commands, arguments included', () => {
      expect(checkToolArguments(tools.run_command, { command: 'git status --short' }, HOME)).toBeUndefined();
      expect(checkToolArguments(tools.run_command, { command: 'cat /tmp/a/b.txt' }, HOME)).toBeUndefined();
      expect(checkToolArguments(tools.run_command, { command: '  git   diff  ' }, HOME)).toBeUndefined();
    });

    it('should deny forbidden commands', () => {
      expect(checkToolArguments(tools.run_command, { command: 'rm -rf /' }, HOME)).toBe(
        "Command 'rm -rf /' matches a forbidden pattern",
      );
    });

    it('should deny commands outside the allow list', () => {
      expect(checkToolArguments(tools.run_command, { command: 'curl example.test' }, HOME)).toBe(
        "Command 'curl example.test' is not in the allowed commands",
      );
    });
  });

  it('should ignore arguments that are not strings', () => {
    expect(checkToolArguments(tools.read_file, { path: 42 }, HOME)).toBeUndefined();
  });
});
