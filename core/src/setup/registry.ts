/**
 * The fixed module order.
 */

import {
  coreToolsModule,
  devToolsModule,
  finalizeModule,
  fontsModule,
  homebrewModule,
  ohMyPoshModule,
  preflightModule,
  tmuxModule,
  zshBaseModule,
  zshPluginsModule,
} from "./modules/index.js";
import type { ProvisionModule } from "./types.js";

export const MODULES: readonly ProvisionModule[] = [
  preflightModule,
  homebrewModule,
  coreToolsModule,
  devToolsModule,
  zshBaseModule,
  zshPluginsModule,
  ohMyPoshModule,
  tmuxModule,
  fontsModule,
  finalizeModule,
];

export function moduleNames(modules: readonly ProvisionModule[] = MODULES): string[] {
  return modules.map((m) => m.name);
}
