import { LoginHistoryIndex, NO_LOGIN_FOUND, parseLoginHistory } from '../login-history';

const LAST_OUTPUT = [
  'alice    pts/0        192.168.1.20     Tue Oct 14 09:12   still logged in',
  'bob      tty1         0.0.0.0          Mon Oct 13 18:40 - 19:02  (00:22)',
  'alice    pts/1        192.168.1.20     Mon Oct 13 08:01 - 17:30  (09:29)',
  'reboot   system boot  6.1.0-13-amd64   Mon Oct 13 07:58   still running',
  '',
  'wtmp begins Sun Oct  5 10:00:01 2025',
];

describe('parseLoginHistory', () => {
  it('keeps the name and the four timestamp fields of each entry', () => {
    const records = parseLoginHistory(LAST_OUTPUT);

    expect(records[0]).toEqual({ name: 'alice', fields: ['Tue', 'Oct', '14', '09:12'] });
    expect(records.map((record) => record.name)).toEqual(['alice', 'bob', 'alice', 'reboot', 'wtmp']);
  });

  it('drops blank lines and lines too short to carry a timestamp', () => {
    expect(parseLoginHistory(['', '   ', 'wtmp begins Sun Oct'])).toEqual([]);
  });
});

describe('LoginHistoryIndex', () => {
  const index = LoginHistoryIndex.fromLines(LAST_OUTPUT);

  it('returns the first entry for an account', () => {
    expect(index.lastLogin('alice')).toBe('Tue Oct 14 09:12');
  });

  it('joins the fields with single spaces', () => {
    expect(index.lastLogin('bob')).toBe('Mon Oct 13 18:40');
  });

  it('returns the sentinel for unknown accounts', () => {
    expect(index.lastLogin('carol')).toBe(NO_LOGIN_FOUND);
    expect(NO_LOGIN_FOUND).toBe('None found');
  });

  it('matches whole names only', () => {
    expect(index.lastLogin('ali')).toBe('None found');
  });

  it('returns the sentinel for every account when empty', () => {
    const empty = LoginHistoryIndex.empty();

    expect(empty.size).toBe(0);
    expect(empty.lastLogin('alice')).toBe('None found');
  });
});
