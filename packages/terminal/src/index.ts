/**
 * @cmdfor/terminal — Type a command into the user's terminal
 */

export { TerminalInjector, createTerminalInjector, type TerminalInjectorOptions } from "./injector.js";
export {
  LibcTerminalControl,
  IoctlError,
  loadLibc,
  type LibcBinding,
  type TerminalControl,
  type TerminalSnapshot,
} from "./control.js";
export { PLATFORM_TABLES, platformTable, clearEchoFlag, type PlatformTable } from "./platform.js";
