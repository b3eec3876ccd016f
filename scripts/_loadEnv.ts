import fs from "fs";
import path from "path";
import dotenv from "dotenv";

const ROOT = process.cwd();

// .env.local wins: dotenv never overwrites a variable that is already set
const files = [".env.local", ".env"];

export function loadEnvFiles(root: string = ROOT): string[] {
  const loaded: string[] = [];
  for (const file of files) {
    const full = path.join(root, file);
    if (fs.existsSync(full)) {
      dotenv.config({ path: full });
      loaded.push(full);
    }
  }
  return loaded;
}

loadEnvFiles();
