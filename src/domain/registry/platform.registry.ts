import { z } from 'zod';
import type { IPlatformClient } from '../ports/platform.port.js';

export interface PlatformMetadata {
  name: string;
  displayName: string;
  credentialsSchema: z.ZodTypeAny;
}

export interface RegisteredPlatform {
  metadata: PlatformMetadata;
  factory: () => IPlatformClient;
}

/**
 * Central registry for platform clients.
 * Clients self-register at module load time.
 */
class PlatformRegistry {
  private platforms = new Map<string, RegisteredPlatform>();

  /**
   * Register a platform client
   */
  register(platform: RegisteredPlatform): void {
    this.platforms.set(platform.metadata.name, platform);
  }

  /**
   * Get all registered platform names
   */
  names(): string[] {
    return [...this.platforms.keys()];
  }

  /**
   * Validate credentials against a platform's schema
   */
  validateCredentials(
    name: string,
    creds: unknown
  ): { success: true; data: unknown } | { success: false; error: string } {
    const platform = this.platforms.get(name);
    if (!platform) {
      return { success: false, error: `Unknown platform: ${name}` };
    }
    const result = platform.metadata.credentialsSchema.safeParse(creds);
    if (!result.success) {
      return { success: false, error: result.error.issues.map((i) => i.message).join('; ') };
    }
    return { success: true, data: result.data };
  }

  /**
   * Create a client for a platform and connect it with validated credentials
   */
  async createClient(name: string, creds: unknown): Promise<IPlatformClient> {
    const platform = this.platforms.get(name);
    if (!platform) {
      throw new Error(`Unknown platform: ${name}. Available: ${this.names().join(', ')}`);
    }

    const validation = this.validateCredentials(name, creds);
    if (!validation.success) {
      throw new Error(`Invalid ${platform.metadata.displayName} credentials: ${validation.error}`);
    }

    const client = platform.factory();
    await client.connect(validation.data);
    return client;
  }
}

// Export singleton instance
export const platformRegistry = new PlatformRegistry();
