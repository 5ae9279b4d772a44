/**
 * Request sequences shared by the route tests.
 */

import type { AppInstance } from "../src/app.js";
import { call, KEYS } from "./setup.js";

type App = AppInstance["app"];

/** Faucet LP to an operator, approve the vault and deposit it all. */
export async function stake(app: App, name: "alice" | "bob", amount: string) {
  await call(app, "owner", "POST", "/api/v1/assets/LP/faucet", {
    to: KEYS[name].account,
    amount,
  });
  await call(app, name, "POST", "/api/v1/assets/LP/approve", { amount });
  return call(app, name, "POST", "/api/v1/vault/deposit", { assets: amount });
}

/** Put `amount` RWD into custody and open a window with it. */
export async function fundRewards(app: App, amount: string) {
  await call(app, "owner", "POST", "/api/v1/assets/RWD/faucet", { to: "vault", amount });
  return call(app, "distributor", "POST", "/api/v1/admin/notify-reward", { amount });
}

export interface ErrorBody {
  error: { code: string; message: string; details?: Record<string, unknown> };
}
