/**
 * Centralized session governance constants.
 *
 * These are the tunable policy knobs that control how a wave session
 * ramps, how often parameters reach the backend, and how patient the
 * focus and routing policies are before they act. Every constant is
 * documented with its purpose and the effect of changing it.
 *
 * NOT included here (wire/schema constants, not governance):
 *   the backend model name, endpoint URLs, default rule and list contents.
 */
export const WAVE_GOVERNANCE = {
  // ─── Session Timing ───────────────────────────────────────────────
  /**
   * Interval between scheduler ticks. Each tick advances `elapsedTime`
   * by one second, so this must stay at 1000 for wall-clock sessions.
   */
  TICK_INTERVAL_MS: 1_000,

  /**
   * Number of accumulated ticks between parameter notifications.
   *
   * Higher → fewer backend updates, coarser steps in the curve.
   * Lower → smoother curve, more prompt/config traffic.
   */
  PARAMETER_UPDATE_TICKS: 5,

  /**
   * Minimum BPM jump (against the last BPM that was sent) that counts as a
   * tempo change. A tempo change forces a context reset on the backend,
   * so lowering this makes the music restart its phrasing more often.
   */
  BPM_CHANGE_THRESHOLD: 10,

  /**
   * Accepted session lengths in seconds and the default length.
   */
  SESSION_MIN_SECONDS: 60,
  SESSION_MAX_SECONDS: 3_600,
  SESSION_DEFAULT_SECONDS: 25 * 60,

  /**
   * Progress fraction at which the curve peaks. Before it the intensity
   * eases in and out toward 1; after it the intensity decelerates to 0.
   */
  PEAK_PROGRESS: 0.75,

  // ─── Parameter Ranges ─────────────────────────────────────────────
  /**
   * Tempo range driven by the wave curve. Intensity 0 maps to the minimum,
   * intensity 1 to the maximum.
   */
  WAVE_BPM_MIN: 60,
  WAVE_BPM_MAX: 150,

  /**
   * Tempo range a user may pick in free-play.
   */
  FREE_PLAY_BPM_MIN: 60,
  FREE_PLAY_BPM_MAX: 200,
  FREE_PLAY_DEFAULT_BPM: 120,

  DENSITY_MIN: 0.1,
  DENSITY_MAX: 0.9,
  BRIGHTNESS_MIN: 0.2,
  BRIGHTNESS_MAX: 0.8,

  /**
   * Floor for the calm/intense prompt weights. The backend rejects a
   * zero-weight prompt, and a floor keeps a trace of each mood audible.
   */
  PROMPT_WEIGHT_FLOOR: 0.1,

  /**
   * Weight given to a user steering prompt appended after the ambient
   * pair. Must exceed 1 so the steering text dominates the blend.
   */
  STEERING_OVERRIDE_WEIGHT: 2.0,

  /**
   * Weight of a routed profile prompt and of the single free-play prompt.
   */
  SINGLE_PROMPT_WEIGHT: 1.0,

  /**
   * Sampling temperature sent with every music config update.
   */
  DEFAULT_TEMPERATURE: 1.0,

  // ─── Focus Policy ─────────────────────────────────────────────────
  /**
   * Seconds a blocked context must persist before the session suspends.
   *
   * Higher → more forgiving of quick glances at a blocked site.
   * Lower → faster suspension, more risk of flapping.
   */
  GRACE_PERIOD_SECONDS: 10,

  POLICY_TICK_INTERVAL_MS: 1_000,

  // ─── Routing Policy ───────────────────────────────────────────────
  /**
   * Milliseconds a routing match must stay stable before the active
   * music profile switches.
   */
  DWELL_PERIOD_MS: 10_000,

  // ─── Context Signal ───────────────────────────────────────────────
  /**
   * Poll interval for the active tab URL while a browser is frontmost.
   */
  BROWSER_POLL_INTERVAL_MS: 2_000,

  // ─── Feedback ─────────────────────────────────────────────────────
  /**
   * Interval between reminder pings while a session is suspended.
   */
  REMINDER_PING_INTERVAL_MS: 3_000,

  /**
   * Time a steering success/error status stays visible before it clears.
   */
  STEERING_STATUS_TTL_MS: 3_000,

  /**
   * Fade-in applied when a wave (re)starts, and the step count of a fade.
   */
  FADE_IN_SECONDS: 5,
  FADE_STEPS: 50,
} as const;
