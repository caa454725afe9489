export * from "./dataset"
export * from "./ids"
export * from "./nodes"
export * from "./relations"
export * from "./ways"
