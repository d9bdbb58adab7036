import { readFile } from 'fs/promises';
import { createLogger } from '../utils/logger.js';
import { describeError } from '../utils/errors.js';
import { incrementMetric } from '../utils/metrics.js';

const log = createLogger('AccessGate');

const USERNAME_PATTERN = /^[A-Za-z0-9_]{5,32}$/;
const NUMERIC_ID = /^-?\d+$/;

export interface AllowList {
  userIds: Set<number>;
  /** Lower-cased, without the leading "@". */
  usernames: Set<string>;
}

export interface ParsedAllowList extends AllowList {
  /** 1-based line numbers that were neither an id nor a valid username. */
  rejectedLines: number[];
}

/**
 * One entry per line: a numeric chat id or a username (with or without "@").
 * Blank lines and lines starting with "#" are ignored.
 */
export function parseAllowList(contents: string): ParsedAllowList {
  const parsed: ParsedAllowList = { userIds: new Set(), usernames: new Set(), rejectedLines: [] };

  contents.split(/\r?\n/).forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) {
      return;
    }
    if (NUMERIC_ID.test(line)) {
      const id = Number.parseInt(line, 10);
      if (Number.isSafeInteger(id)) {
        parsed.userIds.add(id);
        return;
      }
    }
    const username = line.startsWith('@') ? line.slice(1) : line;
    if (USERNAME_PATTERN.test(username)) {
      parsed.usernames.add(username.toLowerCase());
      return;
    }
    parsed.rejectedLines.push(index + 1);
  });

  return parsed;
}

export interface AccessGateOptions {
  path: string;
  ttlMs?: number;
  now?: () => number;
  readFile?: (path: string) => Promise<string>;
}

const EMPTY_LIST: AllowList = { userIds: new Set(), usernames: new Set() };

export class AccessGate {
  private readonly path: string;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly read: (path: string) => Promise<string>;
  private cached: { list: AllowList; loadedAt: number } | null = null;
  private loading: Promise<AllowList> | null = null;

  constructor(options: AccessGateOptions) {
    this.path = options.path;
    this.ttlMs = options.ttlMs ?? 30_000;
    this.now = options.now ?? Date.now;
    this.read = options.readFile ?? ((path) => readFile(path, 'utf8'));
  }

  async isAuthorized(userId: number, username?: string | null): Promise<boolean> {
    const list = await this.current();
    if (list.userIds.has(userId)) {
      return true;
    }
    if (username && list.usernames.has(username.replace(/^@/, '').toLowerCase())) {
      log.debug('Authorized by username', { userId, username });
      return true;
    }
    incrementMetric('access.denied');
    log.warn('Unauthorized access attempt', { userId, username: username ?? null });
    return false;
  }

  /** Forces the next check to re-read the file. */
  invalidate(): void {
    this.cached = null;
  }

  private async current(): Promise<AllowList> {
    if (this.cached && this.now() - this.cached.loadedAt < this.ttlMs) {
      return this.cached.list;
    }
    this.loading ??= this.load().finally(() => {
      this.loading = null;
    });
    return this.loading;
  }

  private async load(): Promise<AllowList> {
    let list: AllowList;
    try {
      const parsed = parseAllowList(await this.read(this.path));
      if (parsed.rejectedLines.length > 0) {
        log.warn('Ignoring malformed allow-list lines', { path: this.path, lines: parsed.rejectedLines });
      }
      list = { userIds: parsed.userIds, usernames: parsed.usernames };
    } catch (error) {
      // Nobody gets in until the file can be read again.
      log.error('Allow-list unreadable; denying everyone', { path: this.path, error: describeError(error) });
      incrementMetric('access.list_unreadable');
      list = EMPTY_LIST;
    }
    this.cached = { list, loadedAt: this.now() };
    return list;
  }
}
