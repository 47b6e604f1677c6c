export * from "./args/parseArgs.js";
export * from "./bin/CtxaskEntrypoint.js";
export * from "./commands/ask/AskCommand.js";
export * from "./commands/catalog/CatalogCommands.js";
