import type { User } from '@dosebell/shared';
import { db, toNumericId, withTransaction } from './shared.js';
import { DataIntegrityError, NotFoundError } from '../../utils/errors.js';
import { isValidTimeZone, requireValidTimeZone } from '../../utils/timezone.js';

interface UserRow {
  telegram_id: string | number;
  username: string | null;
  timezone: string | null;
  created_at: Date;
}

const USER_COLUMNS = 'telegram_id, username, timezone, created_at';

function toUser(row: UserRow): User {
  if (row.timezone !== null && !isValidTimeZone(row.timezone)) {
    throw new DataIntegrityError('Stored user timezone is not a valid IANA zone', {
      telegramId: row.telegram_id,
      timezone: row.timezone
    });
  }
  return {
    telegramId: toNumericId(row.telegram_id, 'users.telegram_id'),
    username: row.username,
    timezone: row.timezone,
    createdAt: row.created_at
  };
}

export async function findUserById(telegramId: number): Promise<User | null> {
  const result = await db.query<UserRow>(
    `SELECT ${USER_COLUMNS} FROM users WHERE telegram_id = $1`,
    [telegramId]
  );
  return result.rows[0] ? toUser(result.rows[0]) : null;
}

/**
 * Creates the user on completed onboarding, or refreshes username and timezone
 * when the record already exists.
 */
export async function upsertUser(
  telegramId: number,
  username: string | null,
  timezone: string
): Promise<User> {
  requireValidTimeZone(timezone);
  return withTransaction(async (client) => {
    const updated = await client.query<UserRow>(
      `UPDATE users SET username = $2, timezone = $3
       WHERE telegram_id = $1
       RETURNING ${USER_COLUMNS}`,
      [telegramId, username, timezone]
    );
    if (updated.rows[0]) {
      return toUser(updated.rows[0]);
    }

    const inserted = await client.query<UserRow>(
      `INSERT INTO users (telegram_id, username, timezone, created_at)
       VALUES ($1, $2, $3, $4)
       RETURNING ${USER_COLUMNS}`,
      [telegramId, username, timezone, new Date()]
    );
    const row = inserted.rows[0];
    if (!row) {
      throw new DataIntegrityError('User insert returned no row', { telegramId });
    }
    return toUser(row);
  });
}

export async function setUserTimezone(telegramId: number, timezone: string): Promise<User> {
  requireValidTimeZone(timezone);
  const result = await db.query<UserRow>(
    `UPDATE users SET timezone = $2 WHERE telegram_id = $1 RETURNING ${USER_COLUMNS}`,
    [telegramId, timezone]
  );
  const row = result.rows[0];
  if (!row) {
    throw new NotFoundError('User not found', { telegramId });
  }
  return toUser(row);
}
