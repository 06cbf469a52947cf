/**
 * Loads and provides access to the radio control-frame protobuf definitions
 */
import protobuf from 'protobufjs';
import path from 'path';
import { logger } from '../utils/logger.js';
import { getEnvironmentConfig } from './config/environment.js';

let root: protobuf.Root | null = null;

export async function loadProtobufDefinitions(protoDir: string = getEnvironmentConfig().protoDir): Promise<protobuf.Root> {
  if (root) {
    return root;
  }

  try {
    const protoPath = path.join(protoDir, 'meshtastic/mesh.proto');

    const loaded = new protobuf.Root();
    loaded.resolvePath = (origin: string, target: string) => {
      // Imports are written relative to the proto root (meshtastic/...)
      if (target.startsWith('meshtastic/')) {
        return path.join(protoDir, target);
      }
      return path.resolve(path.dirname(origin), target);
    };

    await loaded.load(protoPath);
    root = loaded;

    logger.debug(`✅ Loaded control-frame protobuf definitions from ${protoDir}`);
    return root;
  } catch (error) {
    logger.error('❌ Failed to load protobuf definitions:', error);
    throw error;
  }
}

export function getProtobufRoot(): protobuf.Root | null {
  return root;
}

/**
 * Forget the loaded root so the next load reads the files again
 */
export function resetProtobufRoot(): void {
  root = null;
}
