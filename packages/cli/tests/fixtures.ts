import { mkdtemp, mkdir, writeFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

/**
 * Creates a temporary directory holding the given files (path → content).
 * A `config/locales` directory is always created so the root is a workspace.
 */
export async function makeWorkspace(files: Record<string, string> = {}): Promise<string> {
    const root = await mkdtemp(join(tmpdir(), 'locale-modules-'));
    await mkdir(join(root, 'config', 'locales'), { recursive: true });
    for (const [path, content] of Object.entries(files)) {
        const full = join(root, path);
        await mkdir(dirname(full), { recursive: true });
        await writeFile(full, content, 'utf8');
    }
    return root;
}

export async function removeWorkspace(root: string): Promise<void> {
    await rm(root, { recursive: true, force: true });
}
