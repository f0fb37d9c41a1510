/**
 * MediaInfo Wrapper
 *
 * Runs `mediainfo --Output=JSON` and validates the document it prints.
 */

import { z } from 'zod';
import { executeCommand, type CommandRunner } from '@autoencoder/utils';

const trackSchema = z
  .object({
    '@type': z.string(),
    '@typeorder': z.string().optional(),
    StreamOrder: z.string().optional(),
    ID: z.string().optional(),
    Format: z.string().optional(),
    Language: z.string().optional(),
    Title: z.string().optional(),
    Default: z.string().optional(),
    Forced: z.string().optional(),
    StreamSize: z.string().optional(),
    StreamSize_Proportion: z.string().optional(),
  })
  .passthrough();

const mediaInfoSchema = z.object({
  media: z
    .object({
      '@ref': z.string().optional(),
      track: z.array(trackSchema),
    })
    .nullable()
    .optional(),
});

export type MediaInfoTrack = z.infer<typeof trackSchema>;
export type MediaInfoResult = z.infer<typeof mediaInfoSchema>;

export class MediaInfoProbe {
  private mediainfoPath: string;
  private run: CommandRunner;

  constructor(mediainfoPath: string = 'mediainfo', run: CommandRunner = executeCommand) {
    this.mediainfoPath = mediainfoPath;
    this.run = run;
  }

  get binary(): string {
    return this.mediainfoPath;
  }

  /**
   * Probe a media file with mediainfo
   *
   * Rejects when the binary cannot be spawned, exits non-zero or prints
   * something that is not a MediaInfo JSON document.
   */
  async probe(filePath: string): Promise<MediaInfoResult> {
    const args = [
      '--Output=JSON',
      filePath,
    ];

    const result = await this.run(this.mediainfoPath, args, {
      timeout: 60000,
    });

    if (result.exitCode !== 0) {
      throw new Error(`mediainfo failed: ${result.stderr.trim() || `exit code ${result.exitCode}`}`);
    }

    let json: unknown;
    try {
      json = JSON.parse(result.stdout);
    } catch {
      throw new Error(`Failed to parse mediainfo output: ${result.stdout.substring(0, 200)}`);
    }

    const parsed = mediaInfoSchema.safeParse(json);
    if (!parsed.success) {
      throw new Error(`Unexpected mediainfo output: ${parsed.error.issues[0]?.message ?? 'invalid document'}`);
    }
    return parsed.data;
  }
}
