import * as fs from "node:fs";
import * as path from "node:path";
import { randomUUID } from "node:crypto";

/**
 * Replace a file's content in one step: write a temp file beside it, then rename.
 * Readers see either the old content or the new, never a partial write.
 */
export function writeFileAtomic(filePath: string, content: string): void {
	fs.mkdirSync(path.dirname(filePath), { recursive: true });

	const tempPath = `${filePath}.${randomUUID()}.tmp`;
	try {
		fs.writeFileSync(tempPath, content, "utf-8");
		fs.renameSync(tempPath, filePath);
	} catch (err) {
		fs.rmSync(tempPath, { force: true });
		throw err;
	}
}
