import { randomUUID } from 'node:crypto';

import { z } from 'zod';

import type { MoveSequenceAction, MotionStep } from './motion/compiler.js';

export const FACE_EMBEDDING_DIM = 128;

export const DEFAULT_AUDIO_MIME = 'audio/webm';
export const DEFAULT_IMAGE_MIME = 'image/jpeg';
export const DEFAULT_VIDEO_MIME = 'video/mp4';

export const EMOJI_DURATION_MS = 2_000;
export const EMOJI_TRANSITION = 'bounce';

export const POLICY_VIOLATION_CLOSE_CODE = 1008;
export const INTERNAL_ERROR_CLOSE_CODE = 1011;

export const ErrorCode = {
  EmptyAudio: 'EMPTY_AUDIO',
  AgentError: 'AGENT_ERROR',
  UnsupportedMedia: 'UNSUPPORTED_MEDIA',
  InvalidMessage: 'INVALID_MESSAGE',
  InternalError: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

const RequestIdSchema = z.string().trim().min(1).optional();
const Base64Schema = z.string().min(1);

export const ZoneCategorySchema = z.enum(['kitchen', 'living', 'bedroom', 'bathroom', 'unknown']);

export const AuthMessageSchema = z.object({
  type: z.literal('auth'),
  api_key: z.string(),
  device_id: z.string().optional(),
  session_id: z.string().uuid().optional(),
});

export const InteractionStartMessageSchema = z.object({
  type: z.literal('interaction_start'),
  request_id: RequestIdSchema,
  person_id: z.string().trim().min(1).optional(),
  face_embedding: z.array(z.number().finite()).length(FACE_EMBEDDING_DIM).optional(),
  face_confidence: z.number().min(0).max(1).optional(),
});

export const TextMessageSchema = z.object({
  type: z.literal('text'),
  request_id: RequestIdSchema,
  content: z.string(),
});

export const AudioEndMessageSchema = z.object({
  type: z.literal('audio_end'),
  request_id: RequestIdSchema,
  mime: z.string().min(1).default(DEFAULT_AUDIO_MIME),
});

export const ImageMessageSchema = z.object({
  type: z.literal('image'),
  request_id: RequestIdSchema,
  data: Base64Schema,
  mime: z.string().min(1).default(DEFAULT_IMAGE_MIME),
  text: z.string().optional(),
});

export const VideoMessageSchema = z.object({
  type: z.literal('video'),
  request_id: RequestIdSchema,
  data: Base64Schema,
  mime: z.string().min(1).default(DEFAULT_VIDEO_MIME),
  text: z.string().optional(),
});

export const MultimodalMessageSchema = z.object({
  type: z.literal('multimodal'),
  request_id: RequestIdSchema,
  text: z.string().optional(),
  audio: z.string().optional(),
  image: z.string().optional(),
  video: z.string().optional(),
  audio_mime: z.string().min(1).default(DEFAULT_AUDIO_MIME),
  image_mime: z.string().min(1).default(DEFAULT_IMAGE_MIME),
  video_mime: z.string().min(1).default(DEFAULT_VIDEO_MIME),
});

export const ExploreModeMessageSchema = z.object({
  type: z.literal('explore_mode'),
  request_id: RequestIdSchema,
  duration_minutes: z.number().positive().max(120).default(5),
});

export const FaceScanModeMessageSchema = z.object({
  type: z.literal('face_scan_mode'),
  request_id: RequestIdSchema,
});

export const ZoneUpdateMessageSchema = z.object({
  type: z.literal('zone_update'),
  request_id: RequestIdSchema,
  zone_name: z.string().trim().min(1),
  category: ZoneCategorySchema.default('unknown'),
  action: z.enum(['enter', 'leave', 'discover']),
});

export const PersonDetectedMessageSchema = z.object({
  type: z.literal('person_detected'),
  request_id: RequestIdSchema,
  known: z.boolean(),
  person_id: z.string().trim().min(1).optional(),
  confidence: z.number().min(0).max(1).default(0),
});

export const BatteryStatusMessageSchema = z.object({
  type: z.literal('battery_status'),
  battery_level: z.number().min(0).max(100),
  source: z.string().trim().min(1).default('robot'),
});

export const ClientMessageSchema = z.discriminatedUnion('type', [
  AuthMessageSchema,
  InteractionStartMessageSchema,
  TextMessageSchema,
  AudioEndMessageSchema,
  ImageMessageSchema,
  VideoMessageSchema,
  MultimodalMessageSchema,
  ExploreModeMessageSchema,
  FaceScanModeMessageSchema,
  ZoneUpdateMessageSchema,
  PersonDetectedMessageSchema,
  BatteryStatusMessageSchema,
]);

export type ZoneCategory = z.infer<typeof ZoneCategorySchema>;
export type AuthMessage = z.infer<typeof AuthMessageSchema>;
export type InteractionStartMessage = z.infer<typeof InteractionStartMessageSchema>;
export type TextMessage = z.infer<typeof TextMessageSchema>;
export type AudioEndMessage = z.infer<typeof AudioEndMessageSchema>;
export type ImageMessage = z.infer<typeof ImageMessageSchema>;
export type VideoMessage = z.infer<typeof VideoMessageSchema>;
export type MultimodalMessage = z.infer<typeof MultimodalMessageSchema>;
export type ExploreModeMessage = z.infer<typeof ExploreModeMessageSchema>;
export type FaceScanModeMessage = z.infer<typeof FaceScanModeMessageSchema>;
export type ZoneUpdateMessage = z.infer<typeof ZoneUpdateMessageSchema>;
export type PersonDetectedMessage = z.infer<typeof PersonDetectedMessageSchema>;
export type BatteryStatusMessage = z.infer<typeof BatteryStatusMessageSchema>;
export type ClientMessage = z.infer<typeof ClientMessageSchema>;

export type CaptureType = 'photo' | 'video';

export interface AuthOkMessage {
  type: 'auth_ok';
  session_id: string;
}

export interface EmotionMessage {
  type: 'emotion';
  request_id: string;
  emotion: string;
  person_identified?: string;
  confidence?: number;
}

export interface TextChunkMessage {
  type: 'text_chunk';
  request_id: string;
  text: string;
}

export interface CaptureRequestMessage {
  type: 'capture_request';
  request_id: string;
  capture_type: CaptureType;
}

export interface ExpressionPayload {
  emojis: string[];
  duration_per_emoji: number;
  transition: string;
}

export interface ResponseMetaMessage {
  type: 'response_meta';
  request_id: string;
  response_text: string;
  expression: ExpressionPayload;
  actions: MoveSequenceAction[];
  person_name?: string;
}

export interface StreamEndMessage {
  type: 'stream_end';
  request_id: string;
  processing_time_ms: number;
}

export interface ErrorMessage {
  type: 'error';
  error_code: ErrorCode;
  message: string;
  recoverable: boolean;
  request_id?: string;
}

export interface ExplorationActionsMessage {
  type: 'exploration_actions';
  request_id: string;
  actions: MotionStep[];
  exploration_speech: string;
  duration_minutes: number;
}

export interface FaceScanActionsMessage {
  type: 'face_scan_actions';
  request_id: string;
  actions: MotionStep[];
}

export interface LowBatteryAlertMessage {
  type: 'low_battery_alert';
  battery_level: number;
  source: string;
}

export type ServerMessage =
  | AuthOkMessage
  | EmotionMessage
  | TextChunkMessage
  | CaptureRequestMessage
  | ResponseMetaMessage
  | StreamEndMessage
  | ErrorMessage
  | ExplorationActionsMessage
  | FaceScanActionsMessage
  | LowBatteryAlertMessage;

export function newSessionId(): string {
  return randomUUID();
}

export function makeAuthOk(session_id: string): AuthOkMessage {
  return { type: 'auth_ok', session_id };
}

export function makeEmotion(
  request_id: string,
  emotion: string,
  identity?: { person_id: string; confidence?: number },
): EmotionMessage {
  return {
    type: 'emotion',
    request_id,
    emotion,
    ...(identity ? { person_identified: identity.person_id } : {}),
    ...(identity?.confidence !== undefined ? { confidence: identity.confidence } : {}),
  };
}

export function makeTextChunk(request_id: string, text: string): TextChunkMessage {
  return { type: 'text_chunk', request_id, text };
}

export function makeCaptureRequest(request_id: string, capture_type: CaptureType): CaptureRequestMessage {
  return { type: 'capture_request', request_id, capture_type };
}

export function makeResponseMeta(
  request_id: string,
  options: {
    response_text: string;
    emojis: string[];
    actions: MoveSequenceAction[];
    person_name?: string;
  },
): ResponseMetaMessage {
  return {
    type: 'response_meta',
    request_id,
    response_text: options.response_text,
    expression: {
      emojis: options.emojis,
      duration_per_emoji: EMOJI_DURATION_MS,
      transition: EMOJI_TRANSITION,
    },
    actions: options.actions,
    ...(options.person_name ? { person_name: options.person_name } : {}),
  };
}

export function makeStreamEnd(request_id: string, processing_time_ms: number): StreamEndMessage {
  return { type: 'stream_end', request_id, processing_time_ms: Math.max(0, Math.round(processing_time_ms)) };
}

export function makeError(
  error_code: ErrorCode,
  message: string,
  options: { recoverable?: boolean; request_id?: string } = {},
): ErrorMessage {
  return {
    type: 'error',
    error_code,
    message,
    recoverable: options.recoverable ?? true,
    ...(options.request_id ? { request_id: options.request_id } : {}),
  };
}

export function makeExplorationActions(
  request_id: string,
  options: { actions: MotionStep[]; exploration_speech: string; duration_minutes: number },
): ExplorationActionsMessage {
  return {
    type: 'exploration_actions',
    request_id,
    actions: options.actions,
    exploration_speech: options.exploration_speech,
    duration_minutes: options.duration_minutes,
  };
}

export function makeFaceScanActions(request_id: string, actions: MotionStep[]): FaceScanActionsMessage {
  return { type: 'face_scan_actions', request_id, actions };
}

export function makeLowBatteryAlert(battery_level: number, source: string): LowBatteryAlertMessage {
  return { type: 'low_battery_alert', battery_level, source };
}
