import { z } from 'zod'

export const FormatterNameSchema = z.enum(['java', 'kotlin'])

export const LineSeparatorSchema = z.enum(['lf', 'cr', 'crlf'])

export const EngineCommandSchema = z.object({
  command: z.string().min(1),
  stdin: z.boolean().optional(),
  args: z.array(z.string()).optional(),
  profileArgs: z.array(z.string()).optional(),
  levelArgs: z.array(z.string()).optional(),
})

// Config schema
export const ProjectConfigSchema = z.object({
  formatters: z.array(FormatterNameSchema).min(1).default(['java']),
  engine: z.object({
    timeout: z.number().int().positive().default(10000),
    commands: z.object({
      java: EngineCommandSchema.optional(),
      kotlin: EngineCommandSchema.optional(),
    }).strict().default({}),
  }).default({
    timeout: 10000,
    commands: {},
  }),
  exclude: z.array(z.string()).default([]),
  concurrency: z.number().int().min(1).max(64).default(1),
})

// Profile read by the builtin engine
export const BuiltinProfileSchema = z.object({
  indentStyle: z.enum(['space', 'tab']).default('space'),
  indentSize: z.number().int().min(1).max(16).default(4),
  maxBlankLines: z.number().int().min(0).max(10).default(1),
}).strict()

export type BuiltinProfile = z.infer<typeof BuiltinProfileSchema>

export const JobsSchema = z.coerce.number().int().min(1).max(64)
