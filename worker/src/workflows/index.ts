/**
 * Sample workflows bundled with the supervisor; served when no workflow
 * module is configured.
 */

import { defineHandlerSet, type HandlerSet } from "../define.js";
import { helloWorld, helloWorldWithAge } from "./hello-world.js";
import { getEnv } from "./environment.js";
import { processInventory, processOrder, processPricing } from "./coffee-shop.js";

export { helloWorld, helloWorldWithAge } from "./hello-world.js";
export { getEnv } from "./environment.js";
export {
  processPricing,
  processInventory,
  processOrder,
  calculateOrderPrice,
  calculateLoyaltyPoints,
  checkInventory,
  CoffeeOrderSchema,
  type CoffeeOrder,
  type OrderPrice,
  type LoyaltyPoints,
  type LoyaltyTier,
  type InventoryUpdate,
  type OrderSummary,
} from "./coffee-shop.js";

export const sampleHandlerSets: HandlerSet[] = [
  defineHandlerSet("1.0.0", [
    helloWorld,
    helloWorldWithAge,
    getEnv,
    processPricing,
    processInventory,
    processOrder,
  ]),
];
