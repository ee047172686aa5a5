import type { BrowserDriver } from "../driver/types.js";
import type { AuthConfig, EnvironmentConfig, OtpConfig } from "../config/schema.js";
import { DynamicElementResolver, type ResolverOptions } from "../resolver/resolver.js";
import { query } from "../resolver/query.js";
import { currentCode, millisecondsRemaining } from "../otp/totp.js";
import {
  AuthenticationError,
  NavigationError,
  errorMessage,
  type ElementNotFoundError,
} from "../errors.js";
import { ok, err, type Result } from "../utils/result.js";
import { pollUntil, sleep } from "../utils/wait.js";
import { log } from "../utils/logger.js";

export type AuthState =
  | "start"
  | "credentials-submitted"
  | "challenge-detected"
  | "challenge-solved"
  | "session-verified"
  | "failed";

export interface Session {
  readonly authenticated: true;
  readonly establishedAt: Date;
  readonly landingUrl: string;
  /** `skipped` when the environment never asked for a second factor. */
  readonly challenge: "solved" | "skipped";
}

export type AuthFailure = AuthenticationError | NavigationError;

export interface AuthFlowOptions {
  auth: AuthConfig;
  otp: OtpConfig;
  resolver: ResolverOptions;
  /** Milliseconds since epoch; injectable so codes are reproducible. */
  clock?: () => number;
}

/**
 * Drives one login to a verified session:
 * start -> credentials-submitted -> challenge-detected -> challenge-solved -> session-verified,
 * or to `failed`. Nothing is retried here; the caller owns retry policy.
 */
export class AuthenticationFlowController<H> {
  private state: AuthState = "start";
  private readonly history: AuthState[] = ["start"];
  private readonly resolver: DynamicElementResolver<H>;
  private readonly clock: () => number;
  private readonly loginUrl: string;
  private readonly loginPath: string;

  constructor(
    private readonly driver: BrowserDriver<H>,
    private readonly environment: EnvironmentConfig,
    private readonly options: AuthFlowOptions
  ) {
    this.resolver = new DynamicElementResolver(driver, options.resolver);
    this.clock = options.clock ?? Date.now;
    const url = new URL(environment.loginPath, environment.baseUrl);
    this.loginUrl = url.href;
    this.loginPath = url.pathname;
  }

  get currentState(): AuthState {
    return this.state;
  }

  get transitions(): readonly AuthState[] {
    return this.history;
  }

  async authenticate(): Promise<Result<Session, AuthFailure>> {
    if (this.state !== "start") {
      throw new Error(`authenticate() already ran (state: ${this.state})`);
    }
    const { auth } = this.options;

    try {
      await this.driver.navigate(this.loginUrl, auth.navigationTimeoutMs);
    } catch (error) {
      return this.fail(
        new NavigationError(this.loginUrl, `Could not load ${this.loginUrl}: ${errorMessage(error)}`, {
          cause: error,
        })
      );
    }

    const submitted = await this.submitCredentials();
    if (!submitted.ok) return this.fail(submitted.error);
    this.moveTo("credentials-submitted");

    const prompt = await pollUntil(
      async () => {
        if (await this.anyVisible(auth.challengeSelectors)) return "challenge" as const;
        if (await this.anyVisible(auth.rejectionSelectors)) return "rejected" as const;
        if (await this.inAuthenticatedArea()) return "landmark" as const;
        return undefined;
      },
      { timeoutMs: auth.challengeTimeoutMs, intervalMs: auth.pollIntervalMs }
    );

    if (prompt === "rejected") {
      return this.fail(new AuthenticationError("Credentials were rejected by the login form"));
    }
    if (prompt === "landmark") {
      if (auth.challengePolicy === "required") {
        return this.fail(
          new AuthenticationError(
            "Reached the authenticated area without a second-factor prompt, but auth.challengePolicy is \"required\""
          )
        );
      }
      log.warn(
        `No second-factor prompt within ${auth.challengeTimeoutMs}ms; continuing because auth.challengePolicy is "optional"`
      );
      return ok(this.verified("skipped"));
    }
    if (prompt === undefined) {
      return this.fail(
        new AuthenticationError(
          `Neither a second-factor prompt nor the authenticated area appeared within ${auth.challengeTimeoutMs}ms`
        )
      );
    }
    this.moveTo("challenge-detected");

    const solved = await this.solveChallenge();
    if (!solved.ok) return this.fail(solved.error);
    this.moveTo("challenge-solved");

    const outcome = await pollUntil(
      async () => {
        if (await this.anyVisible(auth.rejectionSelectors)) return "rejected" as const;
        if (await this.inAuthenticatedArea()) return "verified" as const;
        return undefined;
      },
      { timeoutMs: auth.verifyTimeoutMs, intervalMs: auth.pollIntervalMs }
    );

    if (outcome === "rejected") {
      return this.fail(new AuthenticationError("One-time code was rejected"));
    }
    if (outcome === undefined) {
      return this.fail(
        new AuthenticationError(
          `Authenticated area did not appear within ${auth.verifyTimeoutMs}ms of submitting the one-time code`
        )
      );
    }
    return ok(this.verified("solved"));
  }

  private async submitCredentials(): Promise<Result<void, AuthenticationError>> {
    const { auth } = this.options;
    const steps: Array<[string, () => Promise<Result<unknown, ElementNotFoundError>>]> = [
      ["username field", () => this.resolver.fill(query(auth.usernameSelector), this.environment.username)],
      ["password field", () => this.resolver.fill(query(auth.passwordSelector), this.environment.password)],
      ["submit button", () => this.resolver.click(query(auth.submitSelector))],
    ];
    for (const [what, run] of steps) {
      const result = await run();
      if (!result.ok) {
        return err(new AuthenticationError(`Login form ${what} missing: ${result.error.message}`));
      }
    }
    return ok(undefined);
  }

  private async solveChallenge(): Promise<Result<void, AuthenticationError>> {
    const { auth, otp } = this.options;

    const now = this.clock();
    const remainingMs = millisecondsRemaining(otp.timeStepSeconds, now);
    let codeTime = now;
    if (remainingMs < auth.freshCodeMarginSeconds * 1000) {
      log.dim(`  auth: ${(remainingMs / 1000).toFixed(1)}s left in this code window, waiting for the next one`);
      await sleep(remainingMs);
      // Never earlier than the next window, even if the clock has not moved.
      codeTime = Math.max(this.clock(), now + remainingMs);
    }

    let code: string;
    try {
      code = currentCode(this.environment.otpSecret, otp.timeStepSeconds, otp.digits, codeTime);
    } catch (error) {
      return err(new AuthenticationError(`Cannot compute one-time code: ${errorMessage(error)}`, { cause: error }));
    }

    const boxes = await this.visible(await this.driver.query(auth.splitOtpSelector));
    if (boxes.length === otp.digits) {
      for (let i = 0; i < boxes.length; i++) {
        await this.driver.fill(boxes[i], code[i]);
      }
    } else {
      const [first, ...rest] = auth.otpInputSelectors;
      const filled = await this.resolver.fill(query(first, ...rest), code);
      if (!filled.ok) {
        return err(new AuthenticationError(`No input for the one-time code: ${filled.error.message}`));
      }
    }

    // Some challenge screens submit on the last digit and show no button.
    const submit = await this.resolver.resolve(query(auth.otpSubmitSelector), 0);
    if (submit.ok) await this.driver.click(submit.value.handle);
    return ok(undefined);
  }

  private async inAuthenticatedArea(): Promise<boolean> {
    const path = new URL(this.driver.currentUrl()).pathname;
    if (path.startsWith(this.loginPath)) return false;
    return this.anyVisible(this.options.auth.landmarkSelectors);
  }

  private async anyVisible(selectors: readonly string[]): Promise<boolean> {
    for (const selector of selectors) {
      if (await this.driver.check({ kind: "selector", selector })) return true;
    }
    return false;
  }

  private async visible(handles: H[]): Promise<H[]> {
    const shown: H[] = [];
    for (const handle of handles) {
      if (await this.driver.isVisible(handle)) shown.push(handle);
    }
    return shown;
  }

  private verified(challenge: Session["challenge"]): Session {
    this.moveTo("session-verified");
    return {
      authenticated: true,
      establishedAt: new Date(this.clock()),
      landingUrl: this.driver.currentUrl(),
      challenge,
    };
  }

  private fail(error: AuthFailure): Result<never, AuthFailure> {
    this.moveTo("failed");
    return err(error);
  }

  private moveTo(next: AuthState): void {
    log.dim(`  auth: ${this.state} -> ${next}`);
    this.state = next;
    this.history.push(next);
  }
}
