// Checks that the string is an absolute http(s) URL the engine can be pointed at.
export function isValidPlaylistUrl(url: string): boolean {
    let parsed: URL;
    try {
        parsed = new URL(url.trim());
    } catch {
        return false;
    }

    return (parsed.protocol === 'http:' || parsed.protocol === 'https:') && parsed.hostname.length > 0;
}


// Device names Windows refuses as file or folder names, with or without an extension.
const RESERVED_NAMES = /^(con|prn|aux|nul|com[0-9]|lpt[0-9])(\..*)?$/i;

const MAX_NAME_LENGTH = 200;

// Makes a string safe to use as a single file or folder name.
export function sanitizeFilename(fileName: string, fallback = 'Untitled'): string {
    const cleaned = fileName
        .replace(/[\/\\?%*:|"<>]/g, '')
        .replace(/\s+/g, ' ')
        .replace(/[\u0000-\u001f\u007f]/g, '')
        .trim()
        .slice(0, MAX_NAME_LENGTH)
        .replace(/[. ]+$/, '');

    if (cleaned.length === 0) {
        return fallback;
    }

    return RESERVED_NAMES.test(cleaned) ? `_${cleaned}` : cleaned;
}


// "Name" -> "Name", "Name (2)", "Name (3)", ...
export function withSuffix(name: string, attempt: number): string {
    return attempt <= 1 ? name : `${name} (${attempt})`;
}
