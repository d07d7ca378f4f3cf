export { preflightModule } from "./preflight.js";
export { homebrewModule } from "./homebrew.js";
export { CORE_FORMULAS, coreToolsModule } from "./core-tools.js";
export { DEV_TOOLS, devToolsModule } from "./dev-tools.js";
export { OH_MY_ZSH_INSTALL_URL, zshBaseModule } from "./zsh-base.js";
export { brewPluginSources, zshPluginEdits, zshPluginsModule } from "./zsh-plugins.js";
export { OMP_INIT_KEY, ohMyPoshEdits, ohMyPoshModule, ompInitLine } from "./oh-my-posh.js";
export {
  OH_MY_TMUX_DIR,
  OH_MY_TMUX_REPO,
  TMUX_CONF,
  TMUX_LOCAL_CONF,
  loadTmuxTemplate,
  tmuxModule,
} from "./tmux.js";
export { FONT_INSTRUCTIONS, FULL_FONTS, MINIMAL_FONTS, fontCask, fontsModule } from "./fonts.js";
export { NEXT_STEPS, finalizeModule } from "./finalize.js";
