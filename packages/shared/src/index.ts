export * from "./errors/CtxaskError.js";
export * from "./logging/Logger.js";
export * from "./paths/PathHelper.js";
