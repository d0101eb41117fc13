import { loadConfigFromDotenv } from "../config.js";
import { createUser } from "../services/users.js";
import { closeStore, openStore } from "../store/open.js";
import { errorFields, log, setLogLevel } from "../utils/log.js";

type Args = {
  username: string;
  email: string;
  password: string;
  firstName: string;
  lastName: string;
};

/** `--username admin --email admin@example.org --password ...`; the password may also come from ADMIN_PASSWORD. */
function parseArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): Args {
  const args: Args = { username: "", email: "", password: env.ADMIN_PASSWORD ?? "", firstName: "", lastName: "" };

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i] ?? "";
    const value = argv[i + 1] ?? "";
    if (a === "--username") args.username = value;
    else if (a === "--email") args.email = value;
    else if (a === "--password") args.password = value;
    else if (a === "--first-name") args.firstName = value;
    else if (a === "--last-name") args.lastName = value;
    else continue;
    i++;
  }

  if (!args.username.trim()) throw new Error("--username is required");
  if (!args.email.trim()) throw new Error("--email is required");
  if (args.password.length < 8) throw new Error("a password of at least 8 characters is required");
  return args;
}

async function main(): Promise<void> {
  const config = loadConfigFromDotenv();
  setLogLevel(config.logLevel);
  if (config.dataStore !== "mongo") throw new Error("createAdmin needs DATA_STORE=mongo");

  const args = parseArgs(process.argv.slice(2));
  const store = await openStore(config);
  try {
    const user = await createUser(store, { ...args, role: "admin" });
    log.info("admin ready", { userId: user.id, username: user.username });
  } finally {
    await closeStore();
  }
}

main().catch((err: unknown) => {
  log.error("createAdmin failed", errorFields(err));
  process.exit(1);
});
