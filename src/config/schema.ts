import { z } from "zod";

export const basicAuthSchema = z.object({
  username: z.string(),
  password: z.string(),
});

export const environmentSchema = z.object({
  baseUrl: z.string().url(),
  loginPath: z.string().default("/login"),
  username: z.string().min(1),
  password: z.string().min(1),
  otpSecret: z.string().min(1),
  basicAuth: basicAuthSchema.optional(),
});

export const authConfigSchema = z.object({
  usernameSelector: z.string().default('input[name="username"]'),
  passwordSelector: z.string().default('input[name="password"]'),
  submitSelector: z.string().default('button[type="submit"]'),
  challengeSelectors: z
    .array(z.string())
    .min(1)
    .default(["text=Two-Factor Authentication"]),
  otpInputSelectors: z
    .array(z.string())
    .min(1)
    .default(['input[name="otp"]', 'input[name="code"]', 'input[type="text"]', 'input[inputmode="numeric"]']),
  splitOtpSelector: z.string().default('input[maxlength="1"]'),
  otpSubmitSelector: z.string().default('button:has-text("Verify")'),
  landmarkSelectors: z.array(z.string()).min(1).default(["main", 'div[role="main"]']),
  rejectionSelectors: z
    .array(z.string())
    .default(["text=Invalid code", "text=Verification failed"]),
  /**
   * `optional`: a post-login landmark without any challenge prompt counts as
   * success (logged as a warning). `required`: the same situation fails.
   */
  challengePolicy: z.enum(["optional", "required"]).default("optional"),
  navigationTimeoutMs: z.number().int().positive().default(30000),
  challengeTimeoutMs: z.number().int().positive().default(10000),
  verifyTimeoutMs: z.number().int().positive().default(15000),
  pollIntervalMs: z.number().int().positive().default(200),
  freshCodeMarginSeconds: z.number().int().min(0).default(3),
});

export const resolverConfigSchema = z.object({
  timeoutMs: z.number().int().min(0).default(5000),
  pollIntervalMs: z.number().int().positive().default(200),
  optionSelector: z.string().default('[role="option"]'),
  comboboxSelector: z.string().default('[role="combobox"]'),
});

export const otpConfigSchema = z.object({
  timeStepSeconds: z.number().int().positive().default(30),
  digits: z.number().int().min(1).max(9).default(6),
});

export const testRailConfigSchema = z.object({
  url: z.string().url(),
  username: z.string().min(1),
  /** TestRail API key (or password when API keys are disabled). */
  password: z.string().min(1),
  projectId: z.number().int().positive(),
  suiteId: z.number().int().positive(),
  runName: z.string().default("Automated run"),
  runDescription: z.string().default("Results published by trailcheck"),
  includeAll: z.boolean().default(true),
  caseMapping: z.string().default("case-mapping.json"),
  closeRun: z.boolean().default(false),
  timeoutMs: z.number().int().positive().default(10000),
});

export const configSchema = z.object({
  environments: z.record(environmentSchema).refine((envs) => Object.keys(envs).length > 0, {
    message: "At least one environment is required",
  }),
  defaultEnvironment: z.string().optional(),
  auth: authConfigSchema.default({}),
  resolver: resolverConfigSchema.default({}),
  otp: otpConfigSchema.default({}),
  scenariosDir: z.string().default("scenarios"),
  artifactsDir: z.string().default(".trailcheck/artifacts"),
  testrail: testRailConfigSchema.optional(),
});

export type TrailcheckConfig = z.input<typeof configSchema>;
export type ParsedConfig = z.infer<typeof configSchema>;
export type EnvironmentConfig = Readonly<z.infer<typeof environmentSchema>>;
export type AuthConfig = z.infer<typeof authConfigSchema>;
export type ResolverConfig = z.infer<typeof resolverConfigSchema>;
export type OtpConfig = z.infer<typeof otpConfigSchema>;
export type TestRailConfig = z.infer<typeof testRailConfigSchema>;

/** Config with one environment selected and relative paths made absolute. */
export interface ResolvedConfig {
  readonly environmentName: string;
  readonly environment: EnvironmentConfig;
  readonly auth: AuthConfig;
  readonly resolver: ResolverConfig;
  readonly otp: OtpConfig;
  readonly scenariosDir: string;
  readonly artifactsDir: string;
  readonly testrail?: TestRailConfig;
}
