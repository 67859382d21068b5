import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";

export const TOKEN_ENV = "NIGHTSCOUT_USER_TOKEN";

const credentialFileSchema = z.object({
  user_token: z.string().trim().min(1).optional(),
});

export type CredentialFile = z.infer<typeof credentialFileSchema>;

/**
 * Load a credential file of the form `{ "user_token": "..." }`.
 */
export function loadCredentialFile(path: string): CredentialFile {
  if (!existsSync(path)) {
    throw new Error(`Credential file not found: ${path}`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (e: unknown) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new Error(`Invalid JSON in credential file ${path}: ${reason}`);
  }
  const result = credentialFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`Malformed credential file ${path}: ${result.error.issues[0]?.message ?? "unknown issue"}`);
  }
  return result.data;
}

/**
 * Token from the credential file when one is given, otherwise from the environment.
 * Returns null when neither provides one.
 */
export function resolveUserToken(
  credentialFile: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): string | null {
  const fromEnv = env[TOKEN_ENV]?.trim() || null;
  if (!credentialFile) return fromEnv;
  return loadCredentialFile(credentialFile).user_token ?? fromEnv;
}

export function requireUserToken(
  credentialFile: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const token = resolveUserToken(credentialFile, env);
  if (!token) {
    throw new Error(
      `Nightscout user token is required. Pass --credential-file or set ${TOKEN_ENV}.`,
    );
  }
  return token;
}
