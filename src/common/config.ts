import dotenv from 'dotenv';

export interface EnvConfig {
  ffmpegPath?: string;
  defaultFps?: string;
  defaultResolution?: string;
}

/**
 * Load .env into process.env and pick out the settings this tool reads
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  dotenv.config();
  return {
    ffmpegPath: env.FFMPEG_PATH || undefined,
    defaultFps: env.FRAMES_DEFAULT_FPS || undefined,
    defaultResolution: env.FRAMES_DEFAULT_RESOLUTION || undefined,
  };
}
