export type MotionParam = number | string;

export interface MotionStep {
  action: string;
  params?: MotionParam[];
  duration_ms?: number;
}

export interface MoveSequence {
  description: string;
  steps: MotionStep[];
  total_duration_ms: number;
  step_count: number;
}

export interface MoveSequenceAction extends MoveSequence {
  type: 'move_sequence';
  emotion_during: string;
}

/** Commands the robot firmware executes directly, with their positional parameter count. */
export const PRIMITIVE_ARITY: Readonly<Record<string, number>> = {
  turn_right_deg: 1,
  turn_left_deg: 1,
  move_forward_cm: 1,
  move_backward_cm: 1,
  led_color: 3,
  led_off: 0,
  pause: 0,
};

interface AliasPart {
  action: string;
  params?: number[];
  weight: number;
}

interface GestureAlias {
  defaultDurationMs: number;
  parts: AliasPart[];
}

export const GESTURE_ALIASES: Readonly<Record<string, GestureAlias>> = {
  wave: {
    defaultDurationMs: 800,
    parts: [
      { action: 'turn_right_deg', params: [20], weight: 1 },
      { action: 'turn_left_deg', params: [40], weight: 2 },
      { action: 'turn_right_deg', params: [20], weight: 1 },
    ],
  },
  nod: {
    defaultDurationMs: 500,
    parts: [
      { action: 'move_forward_cm', params: [2], weight: 1 },
      { action: 'move_backward_cm', params: [2], weight: 1 },
    ],
  },
  shake_head: {
    defaultDurationMs: 600,
    parts: [
      { action: 'turn_left_deg', params: [15], weight: 1 },
      { action: 'turn_right_deg', params: [30], weight: 2 },
      { action: 'turn_left_deg', params: [15], weight: 1 },
    ],
  },
  spin: {
    defaultDurationMs: 1_500,
    parts: [{ action: 'turn_right_deg', params: [360], weight: 1 }],
  },
  rotate_left: {
    defaultDurationMs: 800,
    parts: [{ action: 'turn_left_deg', params: [90], weight: 1 }],
  },
  rotate_right: {
    defaultDurationMs: 800,
    parts: [{ action: 'turn_right_deg', params: [90], weight: 1 }],
  },
  look_around: {
    defaultDurationMs: 2_000,
    parts: [
      { action: 'turn_left_deg', params: [45], weight: 1 },
      { action: 'pause', weight: 1 },
      { action: 'turn_right_deg', params: [90], weight: 2 },
      { action: 'pause', weight: 1 },
      { action: 'turn_left_deg', params: [45], weight: 1 },
    ],
  },
  dance: {
    defaultDurationMs: 2_400,
    parts: [
      { action: 'led_color', params: [255, 0, 255], weight: 1 },
      { action: 'turn_left_deg', params: [45], weight: 2 },
      { action: 'turn_right_deg', params: [90], weight: 3 },
      { action: 'turn_left_deg', params: [45], weight: 2 },
      { action: 'led_off', weight: 1 },
    ],
  },
  celebrate: {
    defaultDurationMs: 2_000,
    parts: [
      { action: 'led_color', params: [0, 255, 0], weight: 1 },
      { action: 'turn_right_deg', params: [360], weight: 3 },
      { action: 'led_off', weight: 1 },
    ],
  },
};

const INTEGER_PATTERN = /^-?\d+$/;
const NUMBER_PATTERN = /^-?\d+(?:\.\d+)?$/;

function toParam(raw: string): MotionParam {
  return NUMBER_PATTERN.test(raw) ? Number(raw) : raw;
}

function lookupAlias(action: string): GestureAlias | undefined {
  return Object.hasOwn(GESTURE_ALIASES, action) ? GESTURE_ALIASES[action] : undefined;
}

function arityOf(action: string): number | undefined {
  if (Object.hasOwn(PRIMITIVE_ARITY, action)) {
    return PRIMITIVE_ARITY[action];
  }

  return lookupAlias(action) ? 0 : undefined;
}

/**
 * Parses one `name(:param)*(:duration_ms)?` step. Known commands take their declared number of
 * parameters and the next segment as duration; for unknown names a trailing integer is the duration.
 */
export function parseMotionStep(raw: string): MotionStep | null {
  const segments = raw.split(':').map((segment) => segment.trim());
  const action = (segments[0] ?? '').toLowerCase();
  if (!action) {
    return null;
  }

  const rest = segments.slice(1).filter((segment) => segment.length > 0);
  const arity = arityOf(action);

  let paramSegments: string[];
  let durationSegment: string | undefined;

  if (arity !== undefined) {
    paramSegments = rest.slice(0, arity);
    durationSegment = rest[arity];
  } else {
    const last = rest[rest.length - 1];
    if (last !== undefined && INTEGER_PATTERN.test(last)) {
      paramSegments = rest.slice(0, -1);
      durationSegment = last;
    } else {
      paramSegments = rest;
    }
  }

  const step: MotionStep = { action };
  if (paramSegments.length > 0) {
    step.params = paramSegments.map(toParam);
  }

  if (durationSegment !== undefined && INTEGER_PATTERN.test(durationSegment)) {
    step.duration_ms = Math.max(0, Number(durationSegment));
  }

  return step;
}

export function parseMotionSteps(body: string): MotionStep[] {
  return body
    .split('|')
    .map((raw) => parseMotionStep(raw))
    .filter((step): step is MotionStep => step !== null);
}

/** Expands a gesture alias into primitives whose durations add up to the alias duration. */
export function expandStep(step: MotionStep): MotionStep[] {
  const alias = lookupAlias(step.action);
  if (!alias) {
    return [step];
  }

  const totalMs = step.duration_ms ?? alias.defaultDurationMs;
  const totalWeight = alias.parts.reduce((sum, part) => sum + part.weight, 0);

  let assignedMs = 0;
  return alias.parts.map((part, index) => {
    const isLast = index === alias.parts.length - 1;
    const durationMs = isLast ? totalMs - assignedMs : Math.floor((totalMs * part.weight) / totalWeight);
    assignedMs += durationMs;

    return {
      action: part.action,
      ...(part.params ? { params: [...part.params] } : {}),
      duration_ms: durationMs,
    };
  });
}

export function buildMoveSequence(description: string, steps: MotionStep[]): MoveSequence {
  const expanded = steps.flatMap((step) => expandStep(step));
  const totalDurationMs = expanded.reduce((sum, step) => sum + (step.duration_ms ?? 0), 0);

  return {
    description,
    steps: expanded,
    total_duration_ms: totalDurationMs,
    step_count: expanded.length,
  };
}

export function buildMoveSequenceAction(
  description: string,
  steps: MotionStep[],
  emotionDuring: string,
): MoveSequenceAction {
  return {
    type: 'move_sequence',
    ...buildMoveSequence(description, steps),
    emotion_during: emotionDuring,
  };
}

const FACE_SCAN_ARC_DEG = 45;

/** Full turn in 45 degree arcs with a pause after each so the camera can settle. */
export function buildFaceScanSequence(): MotionStep[] {
  const steps: MotionStep[] = [{ action: 'led_color', params: [0, 0, 255], duration_ms: 200 }];

  for (let turned = 0; turned < 360; turned += FACE_SCAN_ARC_DEG) {
    steps.push({ action: 'turn_right_deg', params: [FACE_SCAN_ARC_DEG], duration_ms: 600 });
    steps.push({ action: 'pause', duration_ms: 800 });
  }

  steps.push({ action: 'led_off', duration_ms: 100 });
  return steps;
}

export function buildDefaultExplorationSequence(): MotionStep[] {
  return [
    { action: 'move_forward_cm', params: [50], duration_ms: 2_000 },
    { action: 'pause', duration_ms: 500 },
    { action: 'turn_left_deg', params: [90], duration_ms: 1_000 },
    { action: 'move_forward_cm', params: [50], duration_ms: 2_000 },
    { action: 'pause', duration_ms: 500 },
    { action: 'turn_right_deg', params: [180], duration_ms: 1_500 },
  ];
}
