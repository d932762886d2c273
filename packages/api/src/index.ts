export { type AppConfig, loadConfig } from "./config.js";
export { type ApiContext, createContext } from "./context.js";
export { createApiHandler } from "./handler.js";
