/**
 * Zod schema for ConfigStore construction options.
 *
 * Only the data fields are validated here; callbacks and the document factory
 * are typed by ConfigStoreOptions and checked to be functions.
 */

import { z } from 'zod'
import { WATCHER_BACKENDS } from '../watcher/change-watcher.js'

/** Fixed cool-down before the watch re-arms after a reload */
export const DEFAULT_REARM_DELAY_MS = 1000

export const DEFAULT_DEBOUNCE_MS = 50

const optionalFunction = (name: string) =>
  z
    .unknown()
    .refine((value) => value === undefined || typeof value === 'function', {
      message: `${name} must be a function`,
    })
    .optional()

export const ConfigStoreOptionsSchema = z
  .object({
    documentPath: z.string().min(1).optional(),
    autowrite: z.boolean().default(true),
    readonly: z.boolean().default(false),
    fileRequired: z.boolean().default(true),
    watch: z.boolean().default(true),
    watcherBackend: z.enum(WATCHER_BACKENDS).default('fs-watch'),
    rearmDelayMs: z.number().int().nonnegative().default(DEFAULT_REARM_DELAY_MS),
    debounceMs: z.number().int().nonnegative().default(DEFAULT_DEBOUNCE_MS),
    onChange: optionalFunction('onChange'),
    onError: optionalFunction('onError'),
    documentFactory: optionalFunction('documentFactory'),
  })
  .strict()
  .superRefine((options, ctx) => {
    if (options.fileRequired && options.documentPath === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['documentPath'],
        message: 'documentPath is required when fileRequired is true',
      })
    }
  })

export type ResolvedStoreSettings = z.infer<typeof ConfigStoreOptionsSchema>
