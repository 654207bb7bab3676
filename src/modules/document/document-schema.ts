/**
 * Zod schemas for data loaded from a persisted document.
 */

import { z } from 'zod'
import type { ConfigObject, ConfigValue } from '../storage/types.js'

export const ConfigValueSchema: z.ZodType<ConfigValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(ConfigValueSchema),
    z.record(z.string(), ConfigValueSchema),
  ]),
)

/** The top level of every document must be a mapping */
export const DocumentRootSchema: z.ZodType<ConfigObject> = z.record(z.string(), ConfigValueSchema)
