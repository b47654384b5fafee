/**
 * Effect services barrel export.
 */
export * from "./FileSystem"
export * from "./KeyBindingsStore"
