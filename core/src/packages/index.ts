export type { PackageKind, PackageManagerClient } from "./types.js";
export { BrewClient, defaultBrewPrefix, HOMEBREW_INSTALL_URL, type BrewClientOptions } from "./brew-client.js";
