export * from "./export"
export * from "./mermaid"
