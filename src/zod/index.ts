// awkish/zod - Zod schemas for engine configuration
// Use with `import { ... } from "awkish/zod"`

export {
  RulePlacementSchema,
  OutputSinkSchema,
  EngineOptionsSchema,
  SplitArgsSchema,
} from "./engine";
