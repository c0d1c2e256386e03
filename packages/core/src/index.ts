// Blueprint data model
export * from "./blueprint"

// Errors
export * from "./errors"

// Config (settings, detail tiers, platforms)
export * from "./config"

// LLM
export * from "./llm"

// Pipeline
export * from "./pipeline"

// Output (Mermaid, exporters)
export * from "./output"
