// Diff engine and rendering
export * from "./diff/index.js";

// Entity kinds
export * from "./entities/index.js";

// Config loading
export * from "./config/index.js";

// Remote state
export * from "./remote/index.js";

// Output
export * from "./output/index.js";

// Commands
export * from "./cli/index.js";

// Shared utilities
export * from "./shared/index.js";
