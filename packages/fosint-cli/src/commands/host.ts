import chalk from 'chalk';
import { CliContext, type ContextOverrides } from '../utils/context.js';

export async function hostCommand(root: string, ip: string, overrides: ContextOverrides = {}): Promise<void> {
    const ctx = await CliContext.open(root, overrides);
    const report = await ctx.hostIntel().lookup(ip);
    if (!report) {
        console.log(chalk.dim('No host data available.'));
        return;
    }
    if (!report.found) {
        console.log(ctx.ui.muted(`${ip}: no information available`));
        await ctx.record('host-intel', ip, 0);
        return;
    }
    console.log(ctx.ui.heading(report.ip));
    if (report.hostnames.length > 0) console.log(`  Hostnames: ${report.hostnames.join(', ')}`);
    if (report.org) console.log(`  Organisation: ${report.org}`);
    if (report.isp) console.log(`  ISP: ${report.isp}`);
    if (report.os) console.log(`  OS: ${report.os}`);
    if (report.country) console.log(`  Location: ${[report.city, report.country].filter(Boolean).join(', ')}`);
    console.log(`  Open ports: ${report.ports.join(', ') || 'none'}`);
    for (const service of report.services) {
        console.log(ctx.ui.muted(`    ${service.port}/${service.transport} ${[service.product, service.version].filter(Boolean).join(' ')}`));
    }
    if (report.vulns.length > 0) console.log(ctx.ui.danger(`  Vulnerabilities: ${report.vulns.join(', ')}`));
    if (report.lastUpdate) console.log(ctx.ui.muted(`  Last update: ${report.lastUpdate}`));

    await ctx.record('host-intel', ip, 1, [{
        module: 'host-intel',
        title: `${report.ip}: ${report.ports.length} open port(s)${report.vulns.length > 0 ? `, ${report.vulns.length} known vulnerabilities` : ''}`,
        target: report.ip,
        severity: report.vulns.length > 0 ? 'high' : 'info',
        details: { ports: report.ports, vulns: report.vulns, org: report.org },
    }]);
}
