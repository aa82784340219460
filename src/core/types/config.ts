import { z } from 'zod'

// Launch parameters for one browser selector
export const BrowserConfigSchema = z.object({
  executablePath: z.string().min(1).optional(), // auto-detected by chrome-launcher when omitted
  flags: z.array(z.string()).default([]),
})

export type BrowserConfig = z.infer<typeof BrowserConfigSchema>

export const AgentConfigSchema = z.object({
  // Base URL of the coordinator's work directory, e.g. https://coordinator.example/work/
  server: z
    .string()
    .url('server must be a valid URL')
    .transform((url) => (url.endsWith('/') ? url : `${url}/`)),
  location: z.string().min(1, 'location is required'),
  key: z.string().min(1).optional(),
  name: z.string().min(1, 'Agent name is required'),
  workDir: z.string().min(1),
  pollInterval: z.number().int().positive().default(15000), // 15 seconds
  pollTimeout: z.number().int().positive().default(30000), // 30 seconds
  uploadTimeout: z.number().int().positive().default(300000), // 5 minutes
  startBrowserTimeout: z.number().int().positive().default(30000),
  headless: z.boolean().default(false),
  browsers: z.record(z.string(), BrowserConfigSchema).default({}),
})

export type AgentConfig = z.infer<typeof AgentConfigSchema>
