/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createVaultRoutes } from "./vault.js";
export { createAccountRoutes, describeAccount } from "./accounts.js";
export { createAdminRoutes } from "./admin.js";
export { createAssetRoutes } from "./assets.js";
export { createOracleRoutes } from "./oracle.js";
export { createEventRoutes } from "./events.js";
