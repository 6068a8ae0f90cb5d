/**
 * @fileoverview Implementation barrel exports
 *
 * @module @unravel/engine/impl
 */

export { InMemoryEventBus, type InMemoryEventBusOptions } from "./InMemoryEventBus.js";
