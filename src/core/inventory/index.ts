/**
 * Inventory module exports
 */

export {
  ancestry,
  buildInventory,
  chainLength,
  chainUnits,
  compareUnits,
  findOrphan,
  findUnit,
  latestUnit,
  mostRecentChain,
} from "./chain";
export { type ParsedEntries, parseEntries, scanInventory } from "./scanner";
