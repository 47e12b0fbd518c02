import type pg from "pg";
import { randomUUID } from "node:crypto";
import bcrypt from "bcryptjs";
import { toIso } from "../db.js";
import { PersistenceError } from "../errors.js";
import type { ContactDirectory } from "../services/notifier.js";
import type { OwnerContact, User } from "../types.js";

interface UserRow {
  id: string;
  username: string;
  passwordHash: string;
  email: string | null;
  phone: string | null;
  createdAt: Date | string;
}

const USER_COLUMNS = `
  id, username, password_hash AS "passwordHash", email, phone, created_at AS "createdAt"
`;

export class UsernameTakenError extends Error {
  constructor() {
    super("Username already taken");
    this.name = "UsernameTakenError";
  }
}

function rowToUser(row: UserRow): User {
  return { ...row, createdAt: toIso(row.createdAt) };
}

function isUniqueViolation(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "23505";
}

/** Owners of trackers. Also the address book the notifier routes alerts with. */
export class UserStore implements ContactDirectory {
  constructor(
    private readonly pool: pg.Pool,
    private readonly hashRounds = 10,
  ) {}

  async createUser(username: string, password: string, contact: Partial<OwnerContact> = {}): Promise<User> {
    if (await this.findUserByUsername(username)) throw new UsernameTakenError();

    const id = randomUUID();
    const passwordHash = await bcrypt.hash(password, this.hashRounds);
    try {
      const { rows } = await this.pool.query<UserRow>(
        `INSERT INTO users (id, username, password_hash, email, phone)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING ${USER_COLUMNS}`,
        [id, username, passwordHash, contact.email ?? null, contact.phone ?? null],
      );
      return rowToUser(rows[0]);
    } catch (err) {
      if (isUniqueViolation(err)) throw new UsernameTakenError();
      throw new PersistenceError("create user", err);
    }
  }

  async verifyUser(username: string, password: string): Promise<User | null> {
    const user = await this.findUserByUsername(username);
    if (!user) return null;
    const valid = await bcrypt.compare(password, user.passwordHash);
    return valid ? user : null;
  }

  async findUserById(id: string): Promise<User | null> {
    const { rows } = await this.query(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [id]);
    return rows.length === 0 ? null : rowToUser(rows[0]);
  }

  async findUserByUsername(username: string): Promise<User | null> {
    const { rows } = await this.query(
      `SELECT ${USER_COLUMNS} FROM users WHERE LOWER(username) = LOWER($1)`,
      [username],
    );
    return rows.length === 0 ? null : rowToUser(rows[0]);
  }

  async updateContact(id: string, contact: Partial<OwnerContact>): Promise<boolean> {
    const current = await this.findUserById(id);
    if (!current) return false;
    try {
      const { rowCount } = await this.pool.query(
        `UPDATE users SET email = $1, phone = $2 WHERE id = $3`,
        [
          contact.email !== undefined ? contact.email : current.email,
          contact.phone !== undefined ? contact.phone : current.phone,
          id,
        ],
      );
      return (rowCount ?? 0) > 0;
    } catch (err) {
      throw new PersistenceError("update contact", err);
    }
  }

  async getContact(ownerId: string): Promise<OwnerContact | null> {
    const user = await this.findUserById(ownerId);
    return user ? { email: user.email, phone: user.phone } : null;
  }

  private async query(text: string, values: unknown[]): Promise<pg.QueryResult<UserRow>> {
    try {
      return await this.pool.query<UserRow>(text, values);
    } catch (err) {
      throw new PersistenceError("user lookup", err);
    }
  }
}
