import os from "node:os";
import osPath from "path";
import fsExtra from "fs-extra";

export type TmpDirCallback = (dir: string) => Promise<void> | void;

export function withTmpDir(what: TmpDirCallback) {
    return async () => {
        const dir = await fsExtra.mkdtemp(osPath.join(os.tmpdir(), "matrix-test-"));
        try {
            await what(dir);
        } finally {
            await fsExtra.remove(dir);
        }
    };
}

export async function createFiles(dir: string, files: Record<string, string>) {
    for (const [filePath, fileContent] of Object.entries(files)) {
        const target = osPath.join(dir, filePath);
        await fsExtra.ensureDir(osPath.dirname(target));
        await fsExtra.writeFile(target, fileContent, "utf8");
    }
}
