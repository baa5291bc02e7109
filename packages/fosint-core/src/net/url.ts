function parse(url: string): URL | null {
    try {
        return new URL(url);
    } catch {
        return null;
    }
}

export function isOnionUrl(url: string): boolean {
    const parsed = parse(url);
    return !!parsed && parsed.hostname.toLowerCase().endsWith('.onion');
}

export function isValidUrl(url: string): boolean {
    const parsed = parse(url);
    return !!parsed && parsed.protocol.length > 1 && parsed.host.length > 0;
}

/** Host part including port, e.g. `example.com:8080`. */
export function getDomainFromUrl(url: string): string | null {
    const parsed = parse(url);
    return parsed ? parsed.host : null;
}

/** Resolve `href` against `base`; null when the result is not http(s). */
export function resolveHref(base: string, href: string): string | null {
    try {
        const resolved = new URL(href, base);
        if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') return null;
        resolved.hash = '';
        return resolved.toString();
    } catch {
        return null;
    }
}
