export * from "./client"
export * from "./prompts"
export * from "./providers"
