/**
 * Vitest global setup.
 *
 * Creates tmp/ before tests run and removes leftover test
 * directories once they finish.
 */
import { existsSync, mkdirSync, readdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';

const TEST_DIR_PATTERN = /^engine-.+-test-/;

export default function globalSetup(): () => void {

    const tmpDir = join(process.cwd(), 'tmp');

    if (!existsSync(tmpDir)) {

        mkdirSync(tmpDir, { recursive: true });

    }

    return () => {

        for (const name of readdirSync(tmpDir)) {

            if (TEST_DIR_PATTERN.test(name)) {

                rmSync(join(tmpDir, name), { recursive: true, force: true });

            }

        }

    };

}
