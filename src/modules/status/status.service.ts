import { Injectable } from '@nestjs/common';
import { readFileSync } from 'fs';
import { join } from 'path';

export interface ApiStatus {
  status: string;
  version: string;
  timestamp: string;
}

@Injectable()
export class StatusService {
  private readonly version: string;

  constructor() {
    this.version = StatusService.readVersion();
  }

  private static readVersion(): string {
    try {
      const packageJsonPath = join(process.cwd(), 'package.json');
      const packageJson: unknown = JSON.parse(
        readFileSync(packageJsonPath, 'utf8'),
      );
      const version: unknown =
        typeof packageJson === 'object' && packageJson !== null
          ? Reflect.get(packageJson, 'version')
          : undefined;
      return typeof version === 'string' ? version : 'unknown';
    } catch {
      return 'unknown';
    }
  }

  getStatus(): ApiStatus {
    return {
      status: 'OK',
      version: this.version,
      timestamp: new Date().toISOString(),
    };
  }
}
