import { z } from 'zod';

export const UserSchema = z.object({
    userId: z.string(),
    username: z.string(),
    email: z.string(),
    passwordHash: z.string(),
    createdAt: z.string(),
    lastLogin: z.string().nullable().default(null),
    isActive: z.boolean().default(true),
});

export const SessionSchema = z.object({
    sessionId: z.string(),
    userId: z.string(),
    username: z.string(),
    createdAt: z.string(),
    expiresAt: z.string(),
    lastActivity: z.string(),
    data: z.record(z.string()).default({}),
});

export const SeveritySchema = z.enum(['critical', 'high', 'medium', 'low', 'info']);

export const TargetSchema = z.object({
    id: z.string(),
    addedAt: z.string(),
    type: z.string(),
    value: z.string(),
    notes: z.string().optional(),
});

export const FindingSchema = z.object({
    id: z.string(),
    foundAt: z.string(),
    module: z.string(),
    title: z.string(),
    severity: SeveritySchema.default('info'),
    target: z.string().optional(),
    details: z.record(z.unknown()).default({}),
});

export const SearchRecordSchema = z.object({
    id: z.string(),
    performedAt: z.string(),
    module: z.string(),
    query: z.string(),
    resultCount: z.number().int().min(0).default(0),
});

export const NoteSchema = z.object({
    id: z.string(),
    createdAt: z.string(),
    content: z.string(),
    category: z.string().default('general'),
});

export const ReportFormatSchema = z.enum(['md', 'pdf']);

export const ReportRecordSchema = z.object({
    id: z.string(),
    generatedAt: z.string(),
    path: z.string(),
    format: ReportFormatSchema,
});

export const ProjectDataSchema = z.object({
    targets: z.array(TargetSchema).default([]),
    findings: z.array(FindingSchema).default([]),
    reports: z.array(ReportRecordSchema).default([]),
    searches: z.array(SearchRecordSchema).default([]),
    notes: z.array(NoteSchema).default([]),
});

export const ProjectSchema = z.object({
    projectId: z.string(),
    name: z.string(),
    description: z.string().default(''),
    userId: z.string().nullable().default(null),
    createdAt: z.string(),
    updatedAt: z.string(),
    importedAt: z.string().optional(),
    tags: z.array(z.string()).default([]),
    data: ProjectDataSchema.default({}),
});

export const MonitorSourceSchema = z.enum(['google', 'social_media', 'paste_sites', 'darkweb']);

export const MonitoringRuleSchema = z.object({
    ruleId: z.string(),
    name: z.string().default(''),
    keywords: z.array(z.string()).min(1),
    sources: z.array(MonitorSourceSchema).min(1),
    frequencyMinutes: z.number().int().positive().default(60),
    enabled: z.boolean().default(true),
    lastRun: z.string().nullable().default(null),
    createdAt: z.string(),
    filters: z.object({
        date_range: z.string().optional(),
        site: z.string().optional(),
        onion_urls: z.array(z.string()).optional(),
    }).default({}),
});

export const AlertSeveritySchema = z.enum(['critical', 'high', 'medium', 'low']);

export const AlertSchema = z.object({
    alertId: z.string(),
    ruleId: z.string(),
    keyword: z.string(),
    source: z.string(),
    title: z.string().default(''),
    content: z.string(),
    url: z.string(),
    timestamp: z.string(),
    severity: AlertSeveritySchema,
    confidence: z.number().min(0).max(1),
});

export type User = z.infer<typeof UserSchema>;
export type Session = z.infer<typeof SessionSchema>;
export type Severity = z.infer<typeof SeveritySchema>;
export type Target = z.infer<typeof TargetSchema>;
export type Finding = z.infer<typeof FindingSchema>;
export type SearchRecord = z.infer<typeof SearchRecordSchema>;
export type Note = z.infer<typeof NoteSchema>;
export type ReportFormat = z.infer<typeof ReportFormatSchema>;
export type ReportRecord = z.infer<typeof ReportRecordSchema>;
export type ProjectData = z.infer<typeof ProjectDataSchema>;
export type Project = z.infer<typeof ProjectSchema>;
export type MonitorSource = z.infer<typeof MonitorSourceSchema>;
export type MonitoringRule = z.infer<typeof MonitoringRuleSchema>;
export type AlertSeverity = z.infer<typeof AlertSeveritySchema>;
export type Alert = z.infer<typeof AlertSchema>;

/** User as shown outside the store: no password hash. */
export type PublicUser = Omit<User, 'passwordHash'>;
