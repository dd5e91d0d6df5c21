import { z } from 'zod'

// ApplicationProfile describes one supported target application
export const AppProfileSchema = z.object({
  key: z
    .string()
    .min(1, 'App key is required')
    .regex(/^[a-z0-9.-]+$/, 'App key must be lower-case'),
  name: z.string().min(1, 'App name is required'),
  url: z.string().url('Must be a valid URL'),
  loginUrl: z.string().url('Must be a valid URL'),
  emailSelector: z.string().min(1, 'Email field selector is required'),
  passwordSelector: z.string().min(1, 'Password field selector is required'),
  submitSelector: z.string().min(1, 'Submit button selector is required'),
  mfaWaitSeconds: z.number().positive().default(15), // Second-factor wait budget
  complex: z.boolean().default(false), // Higher-complexity apps get the extended agent deadline
})

export type AppProfile = z.infer<typeof AppProfileSchema>

// Config-supplied profiles may omit the key; it is taken from the record key
export const AppProfileInputSchema = AppProfileSchema.omit({ key: true }).extend({
  key: z.string().optional(),
})

export type AppProfileInput = z.input<typeof AppProfileInputSchema>
