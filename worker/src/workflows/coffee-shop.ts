/**
 * Coffee shop order processing: pricing with loyalty discounts, inventory
 * usage, and an order summary combining both.
 */

import { z } from "zod";
import { defineWorkflow } from "../define.js";
import type { Logger } from "../logger.js";

const LOG_PREFIX = "flowhost-worker:workflows:coffee-shop";

const BASE_PRICES = { small: 3.5, medium: 4.0, large: 4.5 } as const;
const DRINK_MARKUPS: Record<string, number> = { latte: 1.0, cappuccino: 1.0, espresso: 0.5 };
const EXTRA_PRICES: Record<string, number> = { extra_shot: 0.8, whipped_cream: 0.5, syrup: 0.5 };
const DISCOUNT_RATES: Record<LoyaltyTier, number> = { bronze: 0, silver: 0.05, gold: 0.1 };

/** Points a customer holds before the current order. */
const STARTING_POINTS = 100;
const BASE_WAIT_MINUTES = 5;

export const CoffeeOrderSchema = z.object({
  orderId: z.string().min(1),
  customerId: z.string().min(1),
  drinkType: z.string().min(1),
  size: z.enum(["small", "medium", "large"]),
  extras: z.array(z.string()).default([]),
});

export type CoffeeOrder = z.infer<typeof CoffeeOrderSchema>;

export const LoyaltyTierSchema = z.enum(["bronze", "silver", "gold"]);
export type LoyaltyTier = z.infer<typeof LoyaltyTierSchema>;

export const OrderPriceSchema = z.object({
  orderId: z.string(),
  basePrice: z.number(),
  extrasCost: z.number(),
  loyaltyDiscount: z.number(),
  finalTotal: z.number(),
});
export type OrderPrice = z.infer<typeof OrderPriceSchema>;

export const LoyaltyPointsSchema = z.object({
  customerId: z.string(),
  pointsEarned: z.number().int(),
  totalPoints: z.number().int(),
  currentTier: LoyaltyTierSchema,
});
export type LoyaltyPoints = z.infer<typeof LoyaltyPointsSchema>;

export const InventoryUpdateSchema = z.object({
  itemsUsed: z.array(z.object({ itemId: z.string(), quantity: z.number().int() })),
  restockNeeded: z.array(z.string()),
});
export type InventoryUpdate = z.infer<typeof InventoryUpdateSchema>;

export const OrderSummarySchema = z.object({
  orderId: z.string(),
  priceInfo: OrderPriceSchema,
  loyaltyInfo: LoyaltyPointsSchema,
  inventoryStatus: z.enum(["READY_TO_PREPARE", "WARNING_LOW_STOCK"]),
  status: z.literal("ACCEPTED"),
  estimatedWait: z.number().int(),
});
export type OrderSummary = z.infer<typeof OrderSummarySchema>;

// ── Tasks ───────────────────────────────────────────────────────────

export function calculateOrderPrice(order: CoffeeOrder, tier: LoyaltyTier): OrderPrice {
  const basePrice = BASE_PRICES[order.size] + (DRINK_MARKUPS[order.drinkType] ?? 0);
  const extrasCost = order.extras.reduce((sum, extra) => sum + (EXTRA_PRICES[extra] ?? 0), 0);
  const loyaltyDiscount = (basePrice + extrasCost) * DISCOUNT_RATES[tier];
  return {
    orderId: order.orderId,
    basePrice,
    extrasCost,
    loyaltyDiscount,
    finalTotal: basePrice + extrasCost - loyaltyDiscount,
  };
}

export function calculateLoyaltyPoints(orderPrice: number, customerId: string): LoyaltyPoints {
  const pointsEarned = Math.trunc(orderPrice);
  const totalPoints = STARTING_POINTS + pointsEarned;
  let currentTier: LoyaltyTier = "bronze";
  if (totalPoints > 500) currentTier = "gold";
  else if (totalPoints > 200) currentTier = "silver";
  return { customerId, pointsEarned, totalPoints, currentTier };
}

export function checkInventory(order: CoffeeOrder): InventoryUpdate {
  const itemsUsed = [
    { itemId: "coffee_beans", quantity: 20 },
    { itemId: "milk", quantity: order.drinkType === "latte" || order.drinkType === "cappuccino" ? 200 : 0 },
  ];
  if (order.extras.includes("extra_shot")) {
    itemsUsed.push({ itemId: "coffee_beans", quantity: 10 });
  }
  const restockNeeded = order.drinkType === "espresso" ? ["coffee_beans"] : [];
  return { itemsUsed, restockNeeded };
}

function pricing(order: CoffeeOrder): { priceInfo: OrderPrice; loyaltyInfo: LoyaltyPoints } {
  const initial = calculateLoyaltyPoints(0, order.customerId);
  const priceInfo = calculateOrderPrice(order, initial.currentTier);
  const loyaltyInfo = calculateLoyaltyPoints(priceInfo.finalTotal, order.customerId);
  return { priceInfo, loyaltyInfo };
}

function inventory(order: CoffeeOrder, log: Logger): InventoryUpdate {
  const update = checkInventory(order);
  if (update.restockNeeded.length > 0) {
    log.warn({ orderId: order.orderId, items: update.restockNeeded }, `${LOG_PREFIX}:inventory - Low stock`);
  }
  return update;
}

// ── Workflows ───────────────────────────────────────────────────────

export const processPricing = defineWorkflow({
  name: "process-pricing",
  description: "Price an order and compute the loyalty points it earns",
  input: CoffeeOrderSchema,
  output: z.object({ priceInfo: OrderPriceSchema, loyaltyInfo: LoyaltyPointsSchema }),
  handler: (order) => pricing(order),
});

export const processInventory = defineWorkflow({
  name: "process-inventory",
  description: "Inventory consumed by an order and items needing restock",
  input: CoffeeOrderSchema,
  output: InventoryUpdateSchema,
  handler: (order, { log }) => inventory(order, log),
});

export const processOrder = defineWorkflow({
  name: "process-order",
  description: "Accept an order: pricing, loyalty, inventory status and wait estimate",
  input: CoffeeOrderSchema,
  output: OrderSummarySchema,
  handler: (order, { log }): OrderSummary => {
    const { priceInfo, loyaltyInfo } = pricing(order);
    const update = inventory(order, log);
    return {
      orderId: order.orderId,
      priceInfo,
      loyaltyInfo,
      inventoryStatus: update.restockNeeded.length === 0 ? "READY_TO_PREPARE" : "WARNING_LOW_STOCK",
      status: "ACCEPTED",
      estimatedWait: BASE_WAIT_MINUTES + order.extras.length,
    };
  },
});
