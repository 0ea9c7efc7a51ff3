import { ConfigService } from '@nestjs/config';

/**
 * Values read from the environment arrive as strings, values passed to
 * `ConfigModule.forRoot({ load })` or a test ConfigService keep their type.
 */
export function readNumber(
  configService: ConfigService,
  key: string,
  fallback: number,
): number {
  const raw = configService.get<string | number>(key);
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = typeof raw === 'number' ? raw : Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

export function readBoolean(
  configService: ConfigService,
  key: string,
  fallback: boolean,
): boolean {
  const raw = configService.get<string | boolean>(key);
  if (typeof raw === 'boolean') {
    return raw;
  }
  if (raw === undefined || raw === '') {
    return fallback;
  }
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

export function readString(
  configService: ConfigService,
  key: string,
): string | undefined {
  const raw = configService.get<string>(key);
  return raw && raw.trim() !== '' ? raw.trim() : undefined;
}
