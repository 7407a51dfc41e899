import fsPromises from 'fs/promises';
import * as path from 'path';
import type { IFileManager } from '../domain/ports';

export class NodeFileSystem implements IFileManager {
    public async readFile(filePath: string): Promise<string> {
        return await fsPromises.readFile(filePath, { encoding: 'utf-8' });
    }

    public async writeFile(filePath: string, content: string): Promise<void> {
        // Ensure the directory exists before writing; 'recursive' covers missing parents too.
        await fsPromises.mkdir(path.dirname(filePath), { recursive: true });
        await fsPromises.writeFile(filePath, content, { encoding: 'utf-8' });
    }

    public async appendFile(filePath: string, content: string): Promise<void> {
        await fsPromises.appendFile(filePath, content, { encoding: 'utf-8' });
    }

    public async fileExists(filePath: string): Promise<boolean> {
        try {
            await fsPromises.access(filePath);
            return true;
        } catch {
            return false;
        }
    }

    /**
     * Names (not paths) of the regular files directly inside a directory.
     */
    public async listFiles(dirPath: string): Promise<string[]> {
        const entries = await fsPromises.readdir(dirPath, { withFileTypes: true });
        return entries.filter(entry => entry.isFile()).map(entry => entry.name);
    }

    public async moveFile(fromPath: string, toPath: string): Promise<void> {
        await fsPromises.mkdir(path.dirname(toPath), { recursive: true });

        try {
            await fsPromises.rename(fromPath, toPath);
        } catch (error) {
            if (!(error instanceof Error) || !('code' in error) || error.code !== 'EXDEV') throw error;

            // rename() cannot cross filesystems (e.g. a Windows drive mounted in WSL)
            await fsPromises.copyFile(fromPath, toPath);
            await fsPromises.unlink(fromPath);
        }
    }

    public joinPaths(...parts: string[]): string {
        return path.join(...parts);
    }
}
