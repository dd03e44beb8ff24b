export { type CliCommand, parseCliArgs, USAGE } from "./args";
export { type CliIo, type LogFile, type MainDeps, main } from "./main";
export { formatSummary, type RenderedOutcome, renderOutcome } from "./output";
export { type CommandOutcome, type RunOrderDeps, runOrderCommand } from "./run";
