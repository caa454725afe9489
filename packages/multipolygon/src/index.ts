export * from "./cache"
export * from "./geojson"
export * from "./join-ways"
export * from "./multipolygon"
export * from "./nesting"
export * from "./polygon-ring"
export * from "./ring-path"
export * from "./role-matcher"
export * from "./settings"
export type * from "./types"
