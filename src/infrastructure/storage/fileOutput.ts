import { mkdir, writeFile } from "fs/promises";
import path from "path";

/** Writes `content`, creating parent directories as needed. */
export const writeOutputFile = async (destination: string, content: string): Promise<void> => {
  await mkdir(path.dirname(path.resolve(destination)), { recursive: true });
  await writeFile(destination, content, "utf-8");
};
