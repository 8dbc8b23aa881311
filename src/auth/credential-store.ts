import { access, chmod, readFile, rename, rm, writeFile } from "node:fs/promises";
import { randomUUID } from "node:crypto";
import { dirname } from "node:path";
import { z } from "zod";
import { ensureDir, getCredentialsPath, getStoreDir } from "../config/paths.js";
import type { Logger } from "../logging/logger.js";
import { errorCode } from "../utils/errors.js";
import { type FileLockOptions, withFileLock } from "../utils/file-lock.js";

export interface Credential {
  readonly homeserver: string;
  readonly userId: string;
  readonly accessToken: string;
  readonly deviceId?: string;
}

const credentialSchema = z.object({
  homeserver: z.string().url(),
  userId: z.string().regex(/^@[^:]+:.+$/, "must look like @user:server"),
  accessToken: z.string().min(1),
  deviceId: z.string().min(1).optional(),
});

const CREDENTIAL_LOCK: FileLockOptions = { retries: 10, retryDelayMs: 100, staleMs: 30_000 };

export interface CredentialStoreOptions {
  readonly filePath?: string;
  /** Local encryption key store, removed together with the credential. */
  readonly storeDir?: string;
}

/**
 * Session credential on disk. Writes go to a sibling temp file that is
 * chmod 0600 and then renamed over the target, so readers only ever see a
 * complete file.
 */
export class CredentialStore {
  readonly filePath: string;
  readonly storeDir: string;

  constructor(
    private readonly logger: Logger,
    opts: CredentialStoreOptions = {},
  ) {
    this.filePath = opts.filePath ?? getCredentialsPath();
    this.storeDir = opts.storeDir ?? getStoreDir();
  }

  async save(credential: Credential): Promise<void> {
    const validated = credentialSchema.parse(credential);
    ensureDir(dirname(this.filePath));

    await withFileLock(this.filePath, async () => {
      const tmpPath = `${this.filePath}.${randomUUID()}.tmp`;
      try {
        await writeFile(tmpPath, JSON.stringify(validated, null, 2) + "\n", { mode: 0o600 });
        await chmod(tmpPath, 0o600);
        await rename(tmpPath, this.filePath);
      } catch (err) {
        await rm(tmpPath, { force: true });
        throw err;
      }
    }, CREDENTIAL_LOCK);
    this.logger.debug({ path: this.filePath, userId: validated.userId }, "Saved credentials");
  }

  /** The saved credential, or undefined when there is none or it cannot be read. */
  async load(): Promise<Credential | undefined> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (err) {
      if (errorCode(err) === "ENOENT") return undefined;
      this.logger.warn({ err, path: this.filePath }, "Could not read credentials file");
      return undefined;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      this.logger.warn({ err, path: this.filePath }, "Credentials file is not valid JSON; ignoring it");
      return undefined;
    }

    const parsed = credentialSchema.safeParse(data);
    if (!parsed.success) {
      this.logger.warn(
        { path: this.filePath, issues: parsed.error.issues.map((i) => i.path.join(".")) },
        "Credentials file is incomplete; ignoring it",
      );
      return undefined;
    }
    return parsed.data;
  }

  /** Remove the credential and the key store. Missing files are fine. */
  async delete(): Promise<void> {
    await rm(this.filePath, { force: true });
    await rm(this.storeDir, { recursive: true, force: true });
    this.logger.debug({ path: this.filePath }, "Deleted credentials");
  }

  async exists(): Promise<boolean> {
    try {
      await access(this.filePath);
      return true;
    } catch {
      return false;
    }
  }
}
