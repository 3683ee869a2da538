export { type ParsedArgs, parseArgv } from "./args.js";
export {
  type CliArgs,
  HELP_TEXT,
  type InterruptSignal,
  type MainDeps,
  main,
  parseArgs,
  resolveCliConfig,
  type SignalSource,
} from "./cli.js";
