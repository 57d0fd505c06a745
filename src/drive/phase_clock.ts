export const DEFAULT_SPEED = 200;
export const DEFAULT_INTERVAL_MS = 16;

export interface PhaseClockOptions {
    /** Animation speed, 60 advances the phase 0.01 rad per tick */
    speed?: number;
    interval_ms?: number;
    /** Receives whatever a tick threw, after the clock has stopped */
    on_error?: (error: unknown) => void;
}

export type PhaseListener = (phi: number) => void;

function log_clock_error(error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    console.error("Phase clock stopped: " + message);
}

/**
 * Drives the input phase at a fixed cadence. Each tick hands the new phase to
 * the listener, which rebuilds whatever curves it shows.
 */
export class PhaseClock {
    phase = 0;
    paused = false;
    readonly speed: number;
    readonly interval_ms: number;
    private readonly on_error: (error: unknown) => void;
    private timer: ReturnType<typeof setInterval> | undefined;

    constructor(private readonly on_tick: PhaseListener, options: PhaseClockOptions = {}) {
        this.speed = options.speed ?? DEFAULT_SPEED;
        this.interval_ms = options.interval_ms ?? DEFAULT_INTERVAL_MS;
        this.on_error = options.on_error ?? log_clock_error;
    }

    get running(): boolean {
        return this.timer !== undefined;
    }

    get step(): number {
        return 0.01 * (this.speed / 60);
    }

    start() {
        if (this.timer !== undefined) {
            return;
        }
        this.timer = setInterval(() => this.tick(), this.interval_ms);
    }

    stop() {
        if (this.timer !== undefined) {
            clearInterval(this.timer);
            this.timer = undefined;
        }
    }

    pause() {
        this.paused = true;
    }

    resume() {
        this.paused = false;
    }

    toggle_pause(): boolean {
        this.paused = !this.paused;
        return this.paused;
    }

    reset() {
        this.phase = 0;
        this.on_tick(this.phase);
    }

    // Timer callback: a throwing listener stops the clock instead of escaping the timer
    private tick() {
        try {
            this.advance();
        } catch (e) {
            this.stop();
            this.on_error(e);
        }
    }

    advance() {
        if (this.paused) {
            return;
        }
        this.phase += this.step;
        this.on_tick(this.phase);
    }
}
