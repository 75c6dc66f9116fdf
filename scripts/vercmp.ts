/**
 * vercmp.ts - Splits a package version string into its components
 *
 * Usage: npx tsx scripts/vercmp.ts <version string>
 */

import { parseVersion } from '../src/version.js';

function main() {
    const args = process.argv.slice(2);

    if (args.length !== 1) {
        console.error('Usage: npx tsx scripts/vercmp.ts <version string>');
        process.exit(1);
    }

    const result = parseVersion(args[0]);
    if (!result.ok) {
        console.error(result.error.message);
        process.exit(1);
    }

    const { epoch, upstream, revision } = result.value;
    console.log(`Epoch:            ${epoch}`);
    console.log(`Upstream version: ${upstream}`);
    console.log(`Debian revision:  ${revision ?? '(none)'}`);
}

main();
