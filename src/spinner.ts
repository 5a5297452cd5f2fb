/**
 * Terminal spinner shown while the model or a tool is working
 *
 * Implements InteractionControl so the permission prompt (and anything else
 * that prints) can suspend it. pause() nests: the spinner only redraws after
 * every pause() has been matched by a resume().
 */

import { color } from "./colors.js";
import type { InteractionControl } from "./permission-prompt.js";

const FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];
const INTERVAL = 80; // ms per frame

export interface SpinnerOptions {
  enabled?: boolean;
  stream?: NodeJS.WriteStream;
}

export class Spinner implements InteractionControl {
  private frame = 0;
  private timer: ReturnType<typeof setInterval> | null = null;
  private startTime = Date.now();
  private label = "";
  private active = false;
  private pauseDepth = 0;
  private readonly enabled: boolean;
  private readonly stream: NodeJS.WriteStream;

  constructor(opts: SpinnerOptions = {}) {
    this.stream = opts.stream ?? process.stderr;
    this.enabled = opts.enabled !== false && this.stream.isTTY === true && process.env.TERM !== "dumb";
  }

  get isActive(): boolean {
    return this.active;
  }

  get isPaused(): boolean {
    return this.pauseDepth > 0;
  }

  start(label: string): void {
    this.label = label;
    this.startTime = Date.now();
    this.frame = 0;
    this.active = true;
    if (this.pauseDepth === 0) this.startTimer();
  }

  stop(): void {
    this.active = false;
    this.stopTimer();
  }

  pause(): void {
    this.pauseDepth += 1;
    this.stopTimer();
  }

  resume(): void {
    this.pauseDepth = Math.max(0, this.pauseDepth - 1);
    if (this.pauseDepth === 0 && this.active) this.startTimer();
  }

  private startTimer(): void {
    if (!this.enabled || this.timer) return;
    this.timer = setInterval(() => this.render(), INTERVAL);
  }

  private stopTimer(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.stream.write("\r\x1b[K");
  }

  private render(): void {
    const frame = FRAMES[this.frame % FRAMES.length];
    this.frame += 1;
    const elapsed = ((Date.now() - this.startTime) / 1000).toFixed(1);
    this.stream.write(`\r\x1b[K${color(`${frame} ${this.label} (${elapsed}s)`, "dim")}`);
  }
}
