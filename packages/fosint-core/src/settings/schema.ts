import { z } from 'zod';

export const ApiKeysSchema = z.object({
    haveibeenpwned: z.string().optional(),
    virustotal: z.string().optional(),
    shodan: z.string().optional(),
    etherscan: z.string().optional(),
});

export const RateLimitsSchema = z.object({
    leak_checker: z.number().int().positive().optional().default(10),
    pgp_search: z.number().int().positive().optional().default(30),
    crypto_tracker: z.number().int().positive().optional().default(30),
    google_dorking: z.number().int().positive().optional().default(20),
    darkweb: z.number().int().positive().optional().default(5),
    reputation: z.number().int().positive().optional().default(4),
});

export const TorSettingsSchema = z.object({
    socks_host: z.string().optional().default('127.0.0.1'),
    socks_port: z.number().int().min(1).max(65535).optional().default(9050),
    control_port: z.number().int().min(1).max(65535).optional().default(9051),
    control_password: z.string().optional(),
    config_file: z.string().optional().default('config/tor_config.txt'),
    use_for_surface_web: z.boolean().optional().default(false),
});

export const ScannerSettingsSchema = z.object({
    max_depth: z.number().int().min(0).optional().default(3),
    timeout_ms: z.number().int().positive().optional().default(60_000),
    delay_min_ms: z.number().int().min(0).optional().default(1_000),
    delay_max_ms: z.number().int().min(0).optional().default(3_000),
    max_pages: z.number().int().positive().optional().default(200),
});

export const DorkingSettingsSchema = z.object({
    max_results: z.number().int().positive().optional().default(100),
    delay_ms: z.number().int().min(0).optional().default(2_000),
    language: z.string().optional().default('en'),
});

export const ThemeSchema = z.enum(['dark', 'light']);

export const SettingsSchema = z.object({
    api_keys: ApiKeysSchema.optional().default({}),
    rate_limits: RateLimitsSchema.optional().default({}),
    tor: TorSettingsSchema.optional().default({}),
    scanner: ScannerSettingsSchema.optional().default({}),
    dorking: DorkingSettingsSchema.optional().default({}),
    ui: z.object({
        theme: ThemeSchema.optional().default('dark'),
    }).optional().default({}),
    projects: z.object({
        auto_save: z.boolean().optional().default(true),
    }).optional().default({}),
});

export type ApiKeys = z.infer<typeof ApiKeysSchema>;
export type ApiKeyName = keyof ApiKeys;
export type RateLimits = z.infer<typeof RateLimitsSchema>;
export type TorSettings = z.infer<typeof TorSettingsSchema>;
export type ScannerSettings = z.infer<typeof ScannerSettingsSchema>;
export type DorkingSettings = z.infer<typeof DorkingSettingsSchema>;
export type Theme = z.infer<typeof ThemeSchema>;
export type Settings = z.infer<typeof SettingsSchema>;

export const API_KEY_NAMES: readonly ApiKeyName[] = ['haveibeenpwned', 'virustotal', 'shodan', 'etherscan'];

export function isApiKeyName(value: string): value is ApiKeyName {
    return (API_KEY_NAMES as readonly string[]).includes(value);
}
