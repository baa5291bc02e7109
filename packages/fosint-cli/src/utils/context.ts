import path from 'path';
import {
    AuthError,
    CryptoTracker,
    DarkWebScanner,
    FetchHttpClient,
    GoogleDorking,
    HostIntel,
    KeywordMonitor,
    LeakChecker,
    Logger,
    MetadataExtractor,
    PgpSearch,
    ProjectManager,
    ReportGenerator,
    SessionManager,
    TorHandler,
    UserStore,
    ensureDirectories,
    errorMessage,
    getWorkspacePaths,
    loadSettings,
    resolveWorkspaceRoot,
    saveSettings,
    type Clock,
    type HttpClient,
    type NewFinding,
    type Settings,
    type WorkspacePaths,
} from '@fosint/core';
import { palette, type Palette } from './theme.js';

const CURRENT_PROJECT_KEY = 'currentProject';

export interface ContextOverrides {
    /** Replaces the surface-web HTTP client. */
    http?: HttpClient;
    /** Replaces the Tor handler (and with it the onion transport). */
    tor?: TorHandler;
    now?: () => Date;
    /** Timing for module rate limits, delays and the monitor schedule. */
    clock?: Clock;
}

export interface SignedInUser {
    userId: string;
    username: string;
}

/**
 * Everything one CLI invocation needs: workspace paths, settings, the resumed
 * session and the project selected in it, plus factories for the modules.
 */
export class CliContext {
    readonly users: UserStore;
    readonly sessions: SessionManager;
    projects: ProjectManager;
    private torHandler: TorHandler | null;
    private surfaceClient: HttpClient | null;

    private constructor(
        readonly paths: WorkspacePaths,
        public settings: Settings,
        private readonly overrides: ContextOverrides,
    ) {
        const now = overrides.now ?? (() => new Date());
        this.users = new UserStore(paths.users, now);
        this.sessions = new SessionManager(paths.sessions, now);
        this.projects = this.projectManagerFor(null);
        this.torHandler = overrides.tor ?? null;
        this.surfaceClient = overrides.http ?? null;
    }

    static async open(root: string = resolveWorkspaceRoot(), overrides: ContextOverrides = {}): Promise<CliContext> {
        const paths = getWorkspacePaths(root);
        ensureDirectories(paths);
        const ctx = new CliContext(paths, loadSettings(paths.settingsFile), overrides);
        await ctx.restore();
        return ctx;
    }

    private projectManagerFor(userId: string | null): ProjectManager {
        return new ProjectManager(this.paths.projects, userId, {
            autoSave: this.settings.projects.auto_save,
            now: this.overrides.now,
        });
    }

    private async restore(): Promise<void> {
        const session = await this.sessions.resume();
        if (!session) return;
        this.projects = this.projectManagerFor(session.userId);
        const projectId = this.sessions.getData(CURRENT_PROJECT_KEY);
        if (!projectId) return;
        const project = await this.projects.load(projectId);
        if (project && project.userId === session.userId) {
            await this.projects.use(projectId);
        } else {
            Logger.debug(`Selected project ${projectId} is gone; clearing selection`);
        }
    }

    get ui(): Palette {
        return palette(this.settings.ui.theme);
    }

    get user(): SignedInUser | null {
        const userId = this.sessions.currentUserId;
        const username = this.sessions.currentUsername;
        return userId && username ? { userId, username } : null;
    }

    requireUser(): SignedInUser {
        const user = this.user;
        if (!user) {
            throw new AuthError('Not signed in. Run `fosint signin` first.');
        }
        return user;
    }

    /** Scope project access to a user who just signed in. */
    useUser(user: SignedInUser): void {
        this.projects = this.projectManagerFor(user.userId);
    }

    async selectProject(projectId: string): Promise<void> {
        this.requireUser();
        await this.projects.use(projectId);
        await this.sessions.setData(CURRENT_PROJECT_KEY, projectId);
    }

    async clearProject(): Promise<void> {
        await this.sessions.setData(CURRENT_PROJECT_KEY, '');
    }

    saveSettings(settings: Settings): void {
        saveSettings(this.paths.settingsFile, settings);
        this.settings = settings;
    }

    get tor(): TorHandler {
        if (!this.torHandler) {
            const tor = this.settings.tor;
            this.torHandler = new TorHandler({
                socksHost: tor.socks_host,
                socksPort: tor.socks_port,
                controlPort: tor.control_port,
                controlPassword: tor.control_password,
                pidFile: path.join(this.paths.temp, 'tor.pid'),
            });
        }
        return this.torHandler;
    }

    get torConfigFile(): string {
        return path.resolve(this.paths.root, this.settings.tor.config_file);
    }

    /** Surface-web transport; goes through Tor when `tor.use_for_surface_web` is set. */
    get http(): HttpClient {
        if (!this.surfaceClient) {
            this.surfaceClient = this.settings.tor.use_for_surface_web ? this.tor.getSession() : new FetchHttpClient();
        }
        return this.surfaceClient;
    }

    private get onionClient(): HttpClient {
        if (this.overrides.http && !this.overrides.tor) return this.overrides.http;
        return this.tor.getSession();
    }

    leakChecker(): LeakChecker {
        return new LeakChecker({ http: this.http, clock: this.overrides.clock, rateLimit: this.settings.rate_limits.leak_checker, apiKey: this.settings.api_keys.haveibeenpwned });
    }

    pgpSearch(): PgpSearch {
        return new PgpSearch({ http: this.http, clock: this.overrides.clock, rateLimit: this.settings.rate_limits.pgp_search });
    }

    cryptoTracker(): CryptoTracker {
        return new CryptoTracker({ http: this.http, clock: this.overrides.clock, rateLimit: this.settings.rate_limits.crypto_tracker, etherscanApiKey: this.settings.api_keys.etherscan });
    }

    dorking(): GoogleDorking {
        const dorking = this.settings.dorking;
        return new GoogleDorking({
            http: this.http,
            clock: this.overrides.clock,
            rateLimit: this.settings.rate_limits.google_dorking,
            maxResults: dorking.max_results,
            delayMs: dorking.delay_ms,
            language: dorking.language,
        });
    }

    /** Crawler over the Tor session; the caller checks that Tor is up. */
    scanner(overrides: { maxDepth?: number; maxPages?: number } = {}): DarkWebScanner {
        const scanner = this.settings.scanner;
        return new DarkWebScanner({
            http: this.onionClient,
            clock: this.overrides.clock,
            rateLimit: this.settings.rate_limits.darkweb,
            maxDepth: overrides.maxDepth ?? scanner.max_depth,
            maxPages: overrides.maxPages ?? scanner.max_pages,
            timeoutMs: scanner.timeout_ms,
            delayMinMs: scanner.delay_min_ms,
            delayMaxMs: scanner.delay_max_ms,
        });
    }

    metadataExtractor(): MetadataExtractor {
        return new MetadataExtractor({ http: this.http, clock: this.overrides.clock, rateLimit: this.settings.rate_limits.reputation, virustotalApiKey: this.settings.api_keys.virustotal });
    }

    hostIntel(): HostIntel {
        return new HostIntel({ http: this.http, clock: this.overrides.clock, rateLimit: this.settings.rate_limits.reputation, shodanApiKey: this.settings.api_keys.shodan });
    }

    monitor(crawler: DarkWebScanner | null = null): KeywordMonitor {
        return new KeywordMonitor({ dir: this.paths.monitoring, searcher: this.dorking(), crawler, clock: this.overrides.clock });
    }

    reports(): ReportGenerator {
        return new ReportGenerator(this.paths.reports, this.projects, this.overrides.now);
    }

    /**
     * Log a module run into the selected project, if any. Recording failures
     * are reported but never fail the lookup itself.
     */
    async record(module: string, query: string, resultCount: number, findings: NewFinding[] = []): Promise<void> {
        if (!this.projects.currentProject) return;
        try {
            await this.projects.addSearch({ module, query, resultCount });
            for (const finding of findings) {
                await this.projects.addFinding(finding);
            }
        } catch (error) {
            Logger.warn(`Could not record ${module} results in project: ${errorMessage(error)}`);
        }
    }
}
