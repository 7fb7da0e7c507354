/**
 * Core module index - exports all core functionality
 */

// Constants
export * from "./constants/index";

// Size parsing and classification
export * from "./sizes/parser";
export * from "./sizes/classifier";

// Snapshots and diffing
export * from "./diff/snapshot";
export * from "./diff/engine";
export * from "./history/index";

// Notifications
export * from "./notify/composer";
export * from "./notify/chunk";
export * from "./notify/format";

// Catalog
export * from "./catalog/index";

// Storage
export * from "./database/index";

// Utils
export * from "./utils/index";

// Config
export * from "./config/index";

// Types
export * from "./types/index";

// Validation
export * from "./validation/index";

// Bot
export * from "./bot/index";

// Services
export * from "./services/index";
