export * from "./response.js";
export * from "./tokens.js";
