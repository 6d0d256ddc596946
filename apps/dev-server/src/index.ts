export {
  handleCLI,
  parsePortArgument,
  CliUsageError,
  USAGE,
  type CliOverrides,
  type RunningServer,
} from "./cli";
