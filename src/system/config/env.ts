import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';

export const ENV_FILES = ['.env.local', '.env'];

/**
 * 环境变量加载器
 */
export class EnvLoader {
  /**
   * 加载第一个存在的.env文件并返回其路径；已设置的环境变量不会被覆盖
   */
  public static initialize(baseDir: string = process.cwd()): string | null {
    for (const fileName of ENV_FILES) {
      const envPath = path.join(baseDir, fileName);
      if (!fs.existsSync(envPath)) {
        continue;
      }
      const result = dotenv.config({ path: envPath });
      if (result.error) {
        console.warn(`Failed to load environment file ${envPath}: ${result.error.message}`);
        continue;
      }
      return envPath;
    }
    return null;
  }
}
