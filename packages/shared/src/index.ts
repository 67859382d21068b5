export { getConfigDir, getModuleConfigPath, readConfig, writeConfig, CONFIG_DIR_ENV } from "./config.js";
export { HttpClient, HttpError } from "./http.js";
export type { FetchLike, HttpOptions, QueryParams } from "./http.js";
export {
  loadCredentialFile,
  resolveUserToken,
  requireUserToken,
  TOKEN_ENV,
} from "./credentials.js";
export type { CredentialFile } from "./credentials.js";
export { error, warn, info } from "./output.js";
