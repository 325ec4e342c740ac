/**
 * @shared/types
 *
 * Document model, configuration types and runtime schemas shared by the
 * build, optimizer and promotion modules.
 */

// Core types
export * from "./resume.types"
export * from "./config.types"

// Runtime schemas (Zod)
export * from "./schemas/config.schema"
export * from "./schemas/optimization.schema"
