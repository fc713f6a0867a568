import { z } from 'zod';

export interface VideoConfig {
  fps: number;
  width: number;
  height: number;
}

export const DEFAULT_CONFIG: VideoConfig = {
  fps: 20,
  width: 256,
  height: 256
};

export const SUPPORTED_EXTENSIONS = ['.png', '.jpg', '.jpeg'];

export const VideoOptionsSchema = z.object({
  input: z.string().min(1, 'Input directory is required'),
  output: z.string().min(1, 'Output directory is required'),
  name: z.string().min(1).optional(),
  fps: z.number().int().positive().default(DEFAULT_CONFIG.fps),
  resolution: z
    .string()
    .regex(/^[1-9]\d*x[1-9]\d*$/, 'Resolution must look like WIDTHxHEIGHT')
    .default(`${DEFAULT_CONFIG.width}x${DEFAULT_CONFIG.height}`),
  recursive: z.boolean().default(false),
  ignoreCase: z.boolean().default(true)
});

export type VideoOptionsInput = z.input<typeof VideoOptionsSchema>;
export type VideoOptions = z.infer<typeof VideoOptionsSchema>;

export interface DirectoryOptions {
  name?: string;
  fps: number;
  resolution: string;
  ignoreCase: boolean;
}

export type VideoStatus = 'created' | 'skipped' | 'failed';

export interface VideoResult {
  framesDir: string;
  outputPath: string;
  frameCount: number;
  status: VideoStatus;
  error?: string;
}

export interface EncodeRequest {
  listPath: string;
  outputPath: string;
  fps: number;
  resolution: string;
  frameCount: number;
}
