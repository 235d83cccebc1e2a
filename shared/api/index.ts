// ESM + NodeNext: include .js in re-exports
export * from "./restaurant-record.dto.js";
export * from "./conversation-turn.dto.js";
