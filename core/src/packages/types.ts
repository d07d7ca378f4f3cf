/**
 * Package-manager client contract. Provisioning modules ask by name and
 * never shell out to the package manager themselves.
 */

export type PackageKind = "formula" | "cask";

export interface PackageManagerClient {
  readonly name: string;
  isAvailable(): Promise<boolean>;
  /** Make the manager's binaries reachable for the rest of the run. */
  activate(): void;
  /** Install the package manager itself. */
  bootstrap(): Promise<void>;
  update(): Promise<void>;
  isInstalled(pkg: string, kind?: PackageKind): Promise<boolean>;
  installedVersion(pkg: string): Promise<string | null>;
  /** Install whichever of `pkgs` are missing; returns the ones installed. */
  install(pkgs: string[], kind?: PackageKind): Promise<string[]>;
  /** Install prefix, or the prefix of one package. */
  prefix(pkg?: string): Promise<string>;
}
