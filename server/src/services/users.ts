import bcrypt from "bcryptjs";

import type { User, UserRole } from "../models/User.js";
import type { Repositories } from "../store/types.js";
import { ConflictError } from "../utils/errors.js";
import { log } from "../utils/log.js";

export const passwordHashRounds = 12;

export type NewUser = {
  username: string;
  email: string;
  password: string;
  role: UserRole;
  firstName?: string;
  lastName?: string;
  isActive?: boolean;
};

export function hashPassword(password: string): Promise<string> {
  return bcrypt.hash(password, passwordHashRounds);
}

/** Creates a system user, active unless told otherwise. Emails are stored lowercased. */
export async function createUser(store: Repositories, input: NewUser): Promise<User> {
  const username = input.username.trim();
  const email = input.email.trim().toLowerCase();

  if (await store.users.findOne({ username })) throw new ConflictError(`Username ${username} is taken`);
  if (await store.users.findOne({ email })) throw new ConflictError(`Email ${email} is taken`);

  const user = await store.users.insert({
    username,
    email,
    firstName: input.firstName?.trim() ?? "",
    lastName: input.lastName?.trim() ?? "",
    role: input.role,
    isActive: input.isActive ?? true,
    passwordHash: await hashPassword(input.password),
  });
  log.info("system user created", { userId: user.id, username: user.username, role: user.role });
  return user;
}
