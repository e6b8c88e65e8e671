/**
 * Translates a glob pattern ("session:abc:*") into an anchored regular expression.
 * Only "*" and "?" are wildcards, everything else matches literally.
 */
export function globToRegExp(pattern: string): RegExp {

    let source = "";

    for (const char of pattern) {

        if (char === "*") source += ".*";
        else if (char === "?") source += ".";
        else source += char.replace(/[.+^${}()|[\]\\]/g, "\\$&");
    }

    return new RegExp(`^${source}$`);
}
