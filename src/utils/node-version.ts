/**
 * Node.js version check utility
 */

const MIN_NODE_VERSION = 20;

/**
 * Exit with a short banner when the running Node.js is older than MIN_NODE_VERSION.
 */
export function checkNodeVersion(version: string = process.versions.node): void {
    const majorVersion = parseInt(version.split('.')[0], 10);

    if (majorVersion < MIN_NODE_VERSION) {
        console.error(`
╔══════════════════════════════════════════════════════════════╗
║  research-agent requires Node.js ${MIN_NODE_VERSION} or higher                ║
╠══════════════════════════════════════════════════════════════╣
║  Current version: ${version.padEnd(43)}║
║  Required:        ${MIN_NODE_VERSION}.0.0 or higher${' '.repeat(27)}║
║                                                              ║
║  Please upgrade Node.js: https://nodejs.org                  ║
╚══════════════════════════════════════════════════════════════╝
`);
        process.exit(1);
    }
}
