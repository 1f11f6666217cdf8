import { ConfigService } from "@nestjs/config";
import {
  readBoolean,
  readPositiveInteger,
} from "../common/config/config-readers";
import { ENGINE_DEFAULTS } from "./consts";
import { MpegAudioOpenOptions } from "./types";

export const MPEG_AUDIO_CONFIG_KEYS = {
  LOOKAHEAD_BYTES: "MPEG_AUDIO_LOOKAHEAD_BYTES",
  CHUNK_SIZE: "MPEG_AUDIO_CHUNK_SIZE",
  TRUST_VBR_HEADER: "MPEG_AUDIO_TRUST_VBR_HEADER",
  PROBE_MIDDLE: "MPEG_AUDIO_PROBE_MIDDLE",
  TRAILING_TAG_TOLERANCE: "MPEG_AUDIO_TRAILING_TAG_TOLERANCE",
} as const;

/**
 * Open options taken from the environment
 * @throws InvalidConfigurationError
 */
export function readMpegAudioConfig(
  configService: ConfigService,
): MpegAudioOpenOptions {
  return {
    lookaheadBytes: readPositiveInteger(
      configService,
      MPEG_AUDIO_CONFIG_KEYS.LOOKAHEAD_BYTES,
      ENGINE_DEFAULTS.LOOKAHEAD_BYTES,
    ),
    chunkSize: readPositiveInteger(
      configService,
      MPEG_AUDIO_CONFIG_KEYS.CHUNK_SIZE,
      ENGINE_DEFAULTS.CHUNK_SIZE,
    ),
    trustVbrHeader: readBoolean(
      configService,
      MPEG_AUDIO_CONFIG_KEYS.TRUST_VBR_HEADER,
      true,
    ),
    probeMiddle: readBoolean(
      configService,
      MPEG_AUDIO_CONFIG_KEYS.PROBE_MIDDLE,
      true,
    ),
    trailingTagTolerance: readPositiveInteger(
      configService,
      MPEG_AUDIO_CONFIG_KEYS.TRAILING_TAG_TOLERANCE,
      ENGINE_DEFAULTS.TRAILING_TAG_TOLERANCE,
    ),
  };
}
