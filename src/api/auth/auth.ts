import bcrypt from 'bcrypt';
import mysql from 'mysql';
import jwt from 'jsonwebtoken';
import { ApiRequest } from '../../utils/net/types';
import { ApiError } from '../../utils/net/errors';
import { loadServerConfig } from '../../utils/config/config';

export const INVALID_TOKEN = 'INVALID';

const TOKEN_LIFETIME = '30d';

interface User {
  id: number;
  username: string;
  password: string;
}

type Credentials = {
  username: string;
  password: string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function getCredentials(body: unknown): Credentials {
  if (!isRecord(body) || typeof body.username !== 'string' || typeof body.password !== 'string') {
    throw new ApiError('Body must contain username and password');
  }
  return { username: body.username, password: body.password };
}

function toUser(rows: unknown): User | null {
  if (!Array.isArray(rows) || rows.length === 0) {
    return null;
  }
  const [row]: unknown[] = rows;
  if (!isRecord(row) || typeof row.id !== 'number' || typeof row.password !== 'string') {
    return null;
  }
  return { id: row.id, username: String(row.username), password: row.password };
}

function findUser(connection: mysql.Connection, username: string): Promise<User | null> {
  return new Promise((resolve, reject) => {
    connection.query({ sql: 'SELECT * FROM users WHERE username = ?', values: [username] }, (error, results) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(toUser(results));
    });
  });
}

/**
 * Returns the user id carried by a valid token, or false
 */
export function isTokenValid(token?: string): number | false {
  if (!token) {
    return false;
  }
  try {
    const decoded = jwt.verify(token, loadServerConfig().jwtSecret);
    if (typeof decoded === 'object' && typeof decoded.userId === 'number') {
      return decoded.userId;
    }
    return false;
  } catch {
    return false;
  }
}

/**
 * Checks a username and password against the users table and issues a token.
 * Any failure answers with the INVALID token rather than an error.
 */
export async function login(request: ApiRequest): Promise<{ token: string }> {
  const { username, password } = getCredentials(request.body);
  const config = loadServerConfig();
  const connection = mysql.createConnection(config.mysql);
  try {
    const user = await findUser(connection, username);
    if (!user || !(await bcrypt.compare(password, user.password))) {
      return { token: INVALID_TOKEN };
    }
    return { token: jwt.sign({ userId: user.id }, config.jwtSecret, { expiresIn: TOKEN_LIFETIME }) };
  } catch (err) {
    console.error(err);
    return { token: INVALID_TOKEN };
  } finally {
    connection.end();
  }
}
