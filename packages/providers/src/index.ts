export * from "./async-result.js"
export * from "./combine.js"
export * from "./data-provider.js"
export * from "./in-memory-provider.js"
export * from "./nested-provider.js"
export * from "./result-cell.js"
export * from "./wait-for-result.js"
