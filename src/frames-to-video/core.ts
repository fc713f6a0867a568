import * as fs from 'fs';
import path from 'path';
import { ZodError } from 'zod';
import { baseName, ensureDirectory, listSubdirectories } from '../common/paths';
import { sortNaturally } from '../natural-sort/core';
import { encodeFrames } from './encoder';
import {
  DirectoryOptions,
  SUPPORTED_EXTENSIONS,
  VideoOptions,
  VideoOptionsInput,
  VideoOptionsSchema,
  VideoResult
} from './types';

function isFrameFile(name: string): boolean {
  return SUPPORTED_EXTENSIONS.includes(path.extname(name).toLowerCase());
}

/**
 * List the image frames of a directory in natural order
 */
export function listFrames(framesDir: string, options: { ignoreCase?: boolean } = {}): string[] {
  if (!fs.existsSync(framesDir) || !fs.statSync(framesDir).isDirectory()) {
    throw new Error(`Frames directory not found: ${framesDir}`);
  }

  const frames = fs
    .readdirSync(framesDir, { withFileTypes: true })
    .filter(dirent => dirent.isFile() && isFrameFile(dirent.name))
    .map(dirent => dirent.name);

  return sortNaturally(frames, { ignoreCase: options.ignoreCase });
}

/**
 * Video name without extension: the explicit name, else the frames directory name
 */
export function resolveOutputName(framesDir: string, name?: string): string {
  return (name || baseName(framesDir)).replace(/\.mp4$/i, '');
}

/**
 * Build the ffmpeg concat-demuxer list that fixes the frame order and timing
 */
export function buildConcatList(framesDir: string, frames: string[], fps: number): string {
  const frameDuration = 1 / fps;
  const lines = frames.flatMap(frame => {
    const framePath = path.resolve(framesDir, frame);
    const escapedPath = framePath.replace(/'/g, "'\\''");
    return [`file '${escapedPath}'`, `duration ${frameDuration}`];
  });
  return lines.join('\n') + '\n';
}

/**
 * Make one video from one directory of frames
 */
export async function processDirectory(
  framesDir: string,
  outputDir: string,
  options: DirectoryOptions
): Promise<VideoResult> {
  ensureDirectory(outputDir);

  const base = resolveOutputName(framesDir, options.name);
  const outputPath = path.join(outputDir, `${base}.mp4`);
  console.log(`Processing ${framesDir} -> ${outputPath}`);

  const frames = listFrames(framesDir, { ignoreCase: options.ignoreCase });
  if (frames.length === 0) {
    console.log(`No image files found in ${framesDir}`);
    return { framesDir, outputPath, frameCount: 0, status: 'skipped' };
  }

  const listPath = path.join(outputDir, `${base}_frames.txt`);
  fs.writeFileSync(listPath, buildConcatList(framesDir, frames, options.fps));

  try {
    await encodeFrames({
      listPath,
      outputPath,
      fps: options.fps,
      resolution: options.resolution,
      frameCount: frames.length
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Error creating video for ${framesDir}: ${message}`);
  } finally {
    fs.rmSync(listPath, { force: true });
  }

  console.log(`✓ Successfully created video: ${outputPath}`);
  return { framesDir, outputPath, frameCount: frames.length, status: 'created' };
}

function validateOptions(input: VideoOptionsInput): VideoOptions {
  try {
    return VideoOptionsSchema.parse(input);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new Error(`Invalid options: ${issues.join('; ')}`);
    }
    throw error;
  }
}

/**
 * Create videos from a frames directory, or from each of its subdirectories
 */
export async function createVideoFromFrames(input: VideoOptionsInput): Promise<VideoResult[]> {
  const options = validateOptions(input);
  const directoryOptions: DirectoryOptions = {
    fps: options.fps,
    resolution: options.resolution,
    ignoreCase: options.ignoreCase
  };

  if (!fs.existsSync(options.input)) {
    throw new Error(`Input directory not found: ${options.input}`);
  }
  ensureDirectory(options.output);

  const results: VideoResult[] = [];

  if (!options.recursive) {
    results.push(await processDirectory(options.input, options.output, { ...directoryOptions, name: options.name }));
  } else {
    if (options.name) {
      console.warn('Warning: --name is ignored with --recursive');
    }

    const folders = sortNaturally(listSubdirectories(options.input), { ignoreCase: options.ignoreCase });
    if (folders.length === 0) {
      results.push(await processDirectory(options.input, options.output, directoryOptions));
    }

    for (const folder of folders) {
      const framesDir = path.join(options.input, folder);
      try {
        results.push(await processDirectory(framesDir, options.output, { ...directoryOptions, name: folder }));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`Error processing folder ${folder}: ${message}`);
        results.push({
          framesDir,
          outputPath: path.join(options.output, `${resolveOutputName(framesDir, folder)}.mp4`),
          frameCount: 0,
          status: 'failed',
          error: message
        });
      }
    }
  }

  console.log('All videos have been processed!');
  return results;
}
