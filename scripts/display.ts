/**
 * display.ts - Prints the parsed structure of a control file
 *
 * Usage: npx tsx scripts/display.ts [control file]
 * Defaults to debian/control in the current directory.
 */

import { ControlDocument } from '../src/document.js';
import { readFile } from '../src/parser.js';
import { dumpDocument } from '../src/renderer.js';

function main() {
    const args = process.argv.slice(2);

    if (args.includes('-?') || args.includes('--help')) {
        console.log('Usage: npx tsx scripts/display.ts [control file]');
        console.log("If no file is specified, this looks for 'debian/control'");
        return;
    }

    const inputFile = args[0] ?? 'debian/control';

    const document = new ControlDocument();
    const status = readFile(document, inputFile);

    process.stdout.write(dumpDocument(document));

    if (!status.ok) {
        process.exitCode = 1;
    }
}

main();
