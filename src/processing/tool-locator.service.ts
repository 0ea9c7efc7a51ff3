import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { constants as fsConstants, promises as fsPromises } from 'fs';
import * as path from 'path';
import { errorMessage } from '../common/abort';
import { readString } from '../config/config.helpers';

export const TOOL_NAMES = ['ffmpeg', 'vspipe'] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

const OVERRIDE_KEYS: Record<ToolName, string> = {
  ffmpeg: 'FFMPEG_PATH',
  vspipe: 'VSPIPE_PATH',
};

/**
 * Resolves external binaries. A configured path wins; otherwise the search
 * path is scanned. Lookups never throw, a missing tool resolves to null.
 */
@Injectable()
export class ToolLocatorService {
  private readonly logger = new Logger(ToolLocatorService.name);

  constructor(private readonly configService: ConfigService) {}

  async locate(tool: ToolName): Promise<string | null> {
    try {
      const configured = readString(this.configService, OVERRIDE_KEYS[tool]);
      if (configured) {
        if (await this.isExecutable(configured)) {
          return configured;
        }
        this.logger.warn(
          `${OVERRIDE_KEYS[tool]} points to ${configured}, which is not an executable file`,
        );
        return null;
      }
      return await this.searchPath(tool);
    } catch (error) {
      this.logger.warn(`Lookup of ${tool} failed: ${errorMessage(error)}`);
      return null;
    }
  }

  private async searchPath(tool: ToolName): Promise<string | null> {
    const searchPath =
      readString(this.configService, 'TOOL_SEARCH_PATH') ?? process.env.PATH ?? '';
    const names = process.platform === 'win32' ? [`${tool}.exe`, tool] : [tool];

    for (const dir of searchPath.split(path.delimiter).filter(Boolean)) {
      for (const name of names) {
        const candidate = path.join(dir, name);
        if (await this.isExecutable(candidate)) {
          this.logger.debug(`Found ${tool} at ${candidate}`);
          return candidate;
        }
      }
    }
    return null;
  }

  private async isExecutable(file: string): Promise<boolean> {
    try {
      const stats = await fsPromises.stat(file);
      if (!stats.isFile()) {
        return false;
      }
      await fsPromises.access(file, fsConstants.X_OK);
      return true;
    } catch {
      return false;
    }
  }
}
