import bcrypt from "bcryptjs";
import { describe, expect, it } from "vitest";

import { createUser } from "../services/users.js";
import { MemoryStore } from "../store/memory.js";
import { ConflictError } from "../utils/errors.js";

describe("createUser", () => {
  it("stores a hashed password and normalized identity", { timeout: 20_000 }, async () => {
    const store = new MemoryStore();

    const user = await createUser(store, {
      username: " admin ",
      email: " Admin@Example.TEST ",
      password: "test-password",
      role: "admin",
      firstName: " Ana ",
    });

    expect(user).toMatchObject({
      username: "admin",
      email: "admin@example.test",
      firstName: "Ana",
      lastName: "",
      role: "admin",
      isActive: true,
    });
    expect(await bcrypt.compare("test-password", user.passwordHash)).toBe(true);

    await expect(
      createUser(store, { username: "admin", email: "otro@example.test", password: "x", role: "technician" })
    ).rejects.toThrow(new ConflictError("Username admin is taken"));
    await expect(
      createUser(store, { username: "otro", email: "ADMIN@example.test", password: "x", role: "technician" })
    ).rejects.toThrow("Email admin@example.test is taken");
    expect(await store.users.count()).toBe(1);
  });
});
