/**
 * DOM Gesture Surface
 *
 * Edge pan recognition over pointer events for browser hosts. A press that
 * lands within `edgeWidth` px of the element's left or right edge starts a
 * pan; the first move reports `began`, later moves `changed`, release
 * `ended` and a system cancel `cancelled`. Only the pointer that started
 * the pan is followed; it is captured on the element until release.
 */

import { ZERO_VECTOR, type GestureSample, type GesturePhase, type ScreenEdge, type Vector } from '@swipeable-tabs/shared-types/gesture';
import type {
  EdgePanRecognizer,
  GestureSurface,
  PanHandler,
  SimultaneousRecognitionGuard,
} from '../interaction/gesture-surface';
import { createLogger } from '../utils/logger';

const logger = createLogger('DomGestureSurface');

// A release later than this after the last move carries no velocity.
const RELEASE_VELOCITY_WINDOW_MS = 100;

export interface DomGestureSurfaceConfig {
  /** Width of the band along each edge where a press can start a pan (default: 24) */
  edgeWidth?: number;
  /** Horizontal bounds of the element in client coordinates */
  bounds?: () => { left: number; right: number };
  /** Clock in ms (default: Date.now) */
  now?: () => number;
}

interface PointerTrack {
  pointerId: number;
  startX: number;
  startY: number;
  lastX: number;
  lastY: number;
  lastTime: number;
  velocity: Vector;
  began: boolean;
}

export class DomGestureSurface implements GestureSurface {
  readonly id: string;
  readonly element: HTMLElement;
  private readonly config: Required<DomGestureSurfaceConfig>;
  private recognizers: Set<PointerEdgePan> = new Set();

  constructor(element: HTMLElement, id: string, config: DomGestureSurfaceConfig = {}) {
    this.element = element;
    this.id = id;
    this.config = {
      edgeWidth: config.edgeWidth ?? 24,
      bounds: config.bounds ?? (() => element.getBoundingClientRect()),
      now: config.now ?? Date.now,
    };
  }

  addEdgePan(edge: ScreenEdge, handler: PanHandler, guard: SimultaneousRecognitionGuard): EdgePanRecognizer {
    const recognizer = new PointerEdgePan(this, edge, handler, guard, this.config);
    this.recognizers.add(recognizer);
    return recognizer;
  }

  get recognizerCount(): number {
    return this.recognizers.size;
  }

  /** @internal */
  activeRecognizers(except: PointerEdgePan): PointerEdgePan[] {
    return [...this.recognizers].filter(r => r !== except && r.isTracking);
  }

  /** @internal */
  forget(recognizer: PointerEdgePan): void {
    this.recognizers.delete(recognizer);
  }
}

class PointerEdgePan implements EdgePanRecognizer {
  private track: PointerTrack | null = null;
  private isEnabled = true;

  constructor(
    private readonly surface: DomGestureSurface,
    readonly edge: ScreenEdge,
    private readonly handler: PanHandler,
    private readonly guard: SimultaneousRecognitionGuard,
    private readonly config: Required<DomGestureSurfaceConfig>
  ) {
    const { element } = surface;
    element.addEventListener('pointerdown', this.handleDown);
    element.addEventListener('pointermove', this.handleMove);
    element.addEventListener('pointerup', this.handleUp);
    element.addEventListener('pointercancel', this.handleCancel);
  }

  get enabled(): boolean {
    return this.isEnabled;
  }

  set enabled(value: boolean) {
    this.isEnabled = value;
    if (!value) {
      this.dropTrack();
    }
  }

  get isTracking(): boolean {
    return this.track !== null;
  }

  translation(): Vector {
    if (!this.track) return { ...ZERO_VECTOR };
    return { x: this.track.lastX - this.track.startX, y: this.track.lastY - this.track.startY };
  }

  detach(): void {
    const { element } = this.surface;
    element.removeEventListener('pointerdown', this.handleDown);
    element.removeEventListener('pointermove', this.handleMove);
    element.removeEventListener('pointerup', this.handleUp);
    element.removeEventListener('pointercancel', this.handleCancel);
    this.dropTrack();
    this.surface.forget(this);
  }

  private handleDown = (e: PointerEvent): void => {
    if (!this.isEnabled || this.track) return;
    if (!this.isWithinEdge(e.clientX)) return;

    // An active pan on the other edge that has already travelled wins.
    for (const other of this.surface.activeRecognizers(this)) {
      if (!this.guard.shouldRecognizeSimultaneously(other, this)) return;
    }

    this.track = {
      pointerId: e.pointerId,
      startX: e.clientX,
      startY: e.clientY,
      lastX: e.clientX,
      lastY: e.clientY,
      lastTime: this.config.now(),
      velocity: { ...ZERO_VECTOR },
      began: false,
    };
    this.capturePointer(e.pointerId);
  };

  private handleMove = (e: PointerEvent): void => {
    const track = this.track;
    if (!this.isEnabled || !track || e.pointerId !== track.pointerId) return;

    const time = this.config.now();
    const elapsed = (time - track.lastTime) / 1000;
    if (elapsed > 0) {
      track.velocity = {
        x: (e.clientX - track.lastX) / elapsed,
        y: (e.clientY - track.lastY) / elapsed,
      };
    }
    track.lastX = e.clientX;
    track.lastY = e.clientY;
    track.lastTime = time;

    const phase: GesturePhase = track.began ? 'changed' : 'began';
    track.began = true;
    this.emit(phase);
  };

  private handleUp = (e: PointerEvent): void => {
    this.finishTrack('ended', e.pointerId);
  };

  private handleCancel = (e: PointerEvent): void => {
    this.finishTrack('cancelled', e.pointerId);
  };

  private finishTrack(phase: GesturePhase, pointerId: number): void {
    const track = this.track;
    if (!this.isEnabled || !track || pointerId !== track.pointerId) return;
    if (this.config.now() - track.lastTime > RELEASE_VELOCITY_WINDOW_MS) {
      // Held still before lifting: not a flick.
      track.velocity = { ...ZERO_VECTOR };
    }
    if (track.began) {
      this.emit(phase);
    }
    this.track = null;
    this.releasePointer(pointerId);
  }

  private dropTrack(): void {
    const track = this.track;
    if (!track) return;
    this.track = null;
    this.releasePointer(track.pointerId);
  }

  private capturePointer(pointerId: number): void {
    try {
      this.surface.element.setPointerCapture(pointerId);
    } catch (error) {
      logger.log('Pointer capture unavailable', { pointerId, error: String(error) });
    }
  }

  private releasePointer(pointerId: number): void {
    try {
      this.surface.element.releasePointerCapture(pointerId);
    } catch (error) {
      logger.log('Pointer release failed', { pointerId, error: String(error) });
    }
  }

  private emit(phase: GesturePhase): void {
    const track = this.track;
    if (!track) return;
    const sample: GestureSample = {
      phase,
      translation: this.translation(),
      velocity: { ...track.velocity },
    };
    this.handler(sample, this);
  }

  private isWithinEdge(clientX: number): boolean {
    const { left, right } = this.config.bounds();
    const { edgeWidth } = this.config;
    return this.edge === 'left'
      ? clientX >= left && clientX - left <= edgeWidth
      : clientX <= right && right - clientX <= edgeWidth;
  }
}
