/**
 * @vestline/sale — Capped, time-boxed sale with vested bonus rewards.
 *
 * Provides:
 * - SaleController, the sale state machine
 * - TimedWindow and AllowlistOracle
 * - Zod configuration loader and pino logger factory
 * - createSale(), which wires an in-process sale from configuration
 *
 * @packageDocumentation
 */

export { SaleController } from "./sale-controller.js";
export type { SaleControllerOptions } from "./sale-controller.js";

export { TimedWindow } from "./timed-window.js";
export { AllowlistOracle } from "./allowlist-oracle.js";

export { SaleConfigSchema, loadSaleConfig } from "./config.js";
export type { SaleConfig } from "./config.js";

export { createLogger, silentLogger } from "./logger.js";
export type { LoggerOptions, LogLevel } from "./logger.js";

export { createSale } from "./create-sale.js";
export type { CreateSaleOptions, Sale } from "./create-sale.js";

export type {
  SaleErrorCode,
  AdmissionRejection,
  AdmissionResult,
  SaleWindow,
  SaleStatus,
  SaleState,
  ContributionReceipt,
  DirectIssueReceipt,
  BonusAllocationReceipt,
} from "./types.js";
export { SaleError } from "./types.js";
