import path from "node:path";
import * as fs from "node:fs/promises";
import { StatementIoError } from "./errors";

export const readInputFile = async (filePath: string): Promise<string> => {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (err) {
    throw new StatementIoError("read", filePath, err);
  }
};

// Writes beside the target and renames over it, so readers never see a half-written file.
export const writeOutputFile = async (filePath: string, content: string): Promise<void> => {
  const tmpPath = path.join(path.dirname(filePath), `.${path.basename(filePath)}.${process.pid}.tmp`);
  try {
    await fs.writeFile(tmpPath, content, "utf8");
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    await fs.rm(tmpPath, { force: true });
    throw new StatementIoError("write", filePath, err);
  }
};
