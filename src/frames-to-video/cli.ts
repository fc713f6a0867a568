#!/usr/bin/env node
import { Command } from "commander";
import ffmpeg from "fluent-ffmpeg";
import { loadEnvConfig } from "../common/config";
import { FLAGS, parseFps, parseResolution } from "../common/flags";
import { CliTimer } from "../common/timer";
import { createVideoFromFrames } from "./core";
import { DEFAULT_CONFIG } from "./types";

interface GenerateCliOptions {
  input: string;
  output: string;
  name?: string;
  resolution: string;
  fps: number;
  recursive?: boolean;
  caseSensitive?: boolean;
}

export async function main(argv: string[] = process.argv) {
  const timer = new CliTimer();
  timer.start();

  try {
    const env = loadEnvConfig();
    if (env.ffmpegPath) {
      ffmpeg.setFfmpegPath(env.ffmpegPath);
    }

    const defaultFps = env.defaultFps ? parseFps(env.defaultFps) : DEFAULT_CONFIG.fps;
    const defaultResolution = env.defaultResolution
      ? parseResolution(env.defaultResolution)
      : `${DEFAULT_CONFIG.width}x${DEFAULT_CONFIG.height}`;

    const program = new Command();

    // Create generate command (default)
    const generateCmd = new Command('generate')
      .description('Create a video from a directory of image frames')
      .requiredOption(FLAGS.input.flag, FLAGS.input.description)
      .requiredOption(FLAGS.output.flag, FLAGS.output.description)
      .option(FLAGS.name.flag, FLAGS.name.description)
      .option(FLAGS.resolution.flag, FLAGS.resolution.description, parseResolution, defaultResolution)
      .option(FLAGS.fps.flag, FLAGS.fps.description, parseFps, defaultFps)
      .option(FLAGS.recursive.flag, FLAGS.recursive.description)
      .option(FLAGS.caseSensitive.flag, FLAGS.caseSensitive.description)
      .action(async (options: GenerateCliOptions) => {
        try {
          const results = await createVideoFromFrames({
            input: options.input,
            output: options.output,
            name: options.name,
            fps: options.fps,
            resolution: options.resolution,
            recursive: Boolean(options.recursive),
            ignoreCase: !options.caseSensitive
          });

          const failed = results.filter(result => result.status === 'failed');
          if (failed.length > 0) {
            console.error(`Failed to create ${failed.length} of ${results.length} videos`);
            process.exitCode = 1;
          }
        } catch (error) {
          console.error('Error:', error instanceof Error ? error.message : 'Unknown error');
          process.exitCode = 1;
        }
      });

    // Set up main program
    program
      .name("frames-to-video")
      .description("Create videos from image frames without requiring zero-padding in filenames")
      .addCommand(generateCmd, { isDefault: true });

    await program.parseAsync(argv);
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : 'Unknown error');
    process.exitCode = 1;
  } finally {
    timer.stop();
  }
}

if (require.main === module) {
  void main();
}
