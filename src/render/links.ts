import { existsSync } from "node:fs";
import { join, resolve } from "node:path";
import { formatForPath, withRenderedExtension } from "../content/formats";
import { SiteError, type Reporter } from "../errors";

export interface LinkContext {
  /** Absolute directory of the document being rendered */
  sourceDir: string;
  /** Absolute site root, used for "/"-rooted destinations */
  siteRoot: string;
  /** Prepended to every rewritten destination */
  linkPrefix: string;
  reporter: Reporter;
}

const URL_SCHEME = /^[a-z][a-z\d+.-]*:/i;

/**
 * Split "a/b.md?x=1#top" into ["a/b.md", "?x=1#top"]
 */
function splitSuffix(destination: string): [string, string] {
  const index = destination.search(/[?#]/);
  if (index === -1) {
    return [destination, ""];
  }
  return [destination.slice(0, index), destination.slice(index)];
}

function decodePath(path: string): string {
  try {
    return decodeURI(path);
  } catch {
    // Malformed escapes: check the path as written
    return path;
  }
}

/**
 * Point a link at another site document to that document's rendered page.
 *
 * Destinations that are external, anchors, or not markup files come back
 * unchanged. A markup target that does not exist on disk is still
 * rewritten, and a dangling-link error goes to the reporter.
 */
export function rewriteLinkDestination(
  destination: string,
  context: LinkContext
): string {
  if (
    !destination ||
    destination.startsWith("#") ||
    destination.startsWith("//") ||
    URL_SCHEME.test(destination)
  ) {
    return destination;
  }

  const [path, suffix] = splitSuffix(destination);
  if (!formatForPath(path)) {
    return destination;
  }

  const decoded = decodePath(path);
  const referencedPath = decoded.startsWith("/")
    ? join(context.siteRoot, decoded)
    : resolve(context.sourceDir, decoded);

  if (!existsSync(referencedPath)) {
    context.reporter.report(SiteError.danglingLink(referencedPath));
  }

  return `${context.linkPrefix}${withRenderedExtension(path)}${suffix}`;
}
