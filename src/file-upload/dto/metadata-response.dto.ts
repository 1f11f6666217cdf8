import { Certainty } from "../../mpeg-audio/types";

/**
 * A measured value, or nulls when the engine could not answer
 */
export interface MeasurementDto {
  value: number | null;
  certainty: Certainty | null;
}

export interface MetadataResponseDto {
  filename: string;
  version: string;
  layer: string;
  sampleRate: number;
  channelMode: string;
  /** kbps of the first frame */
  bitrate: number | "free-format";
  isVbr: boolean;
  vbrHeader: string | null;
  durationSeconds: MeasurementDto;
  frameCount: MeasurementDto;
  sampleCount: MeasurementDto;
  averageBitrateKbps: MeasurementDto;
  parseState: string;
  /** Null unless every frame was walked */
  scanComplete: boolean | null;
  corruptRegions: number;
}
