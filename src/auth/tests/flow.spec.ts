import { describe, it, expect, beforeEach } from "vitest";
import { AuthenticationFlowController } from "../flow.js";
import { installLoginApp, NOW } from "./login-app.js";
import { FakeDriver, el } from "../../driver/tests/fake-driver.js";
import { authConfigSchema, otpConfigSchema, type EnvironmentConfig } from "../../config/schema.js";
import { currentCode } from "../../otp/totp.js";
import { AuthenticationError, NavigationError } from "../../errors.js";

const environment: EnvironmentConfig = {
  baseUrl: "https://x/login",
  loginPath: "/login",
  username: "u",
  password: "p",
  otpSecret: "BASE32SECRET",
};

const resolver = {
  timeoutMs: 30,
  pollIntervalMs: 5,
  optionSelector: '[role="option"]',
  comboboxSelector: '[role="combobox"]',
};

function controller(driver: FakeDriver, auth: Record<string, unknown> = {}, clock = () => NOW) {
  return new AuthenticationFlowController(driver, environment, {
    auth: authConfigSchema.parse({
      challengeTimeoutMs: 200,
      verifyTimeoutMs: 200,
      pollIntervalMs: 5,
      ...auth,
    }),
    otp: otpConfigSchema.parse({}),
    resolver,
    clock,
  });
}

describe("AuthenticationFlowController", () => {
  let driver: FakeDriver;

  beforeEach(() => {
    driver = new FakeDriver();
  });

  it("should reach a verified session through the challenge in four transitions", async () => {
    installLoginApp(driver, { secret: "BASE32SECRET", challenge: true });
    const flow = controller(driver);

    const result = await flow.authenticate();

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.authenticated).toBe(true);
    expect(result.value.challenge).toBe("solved");
    expect(result.value.landingUrl).toBe("https://x/home");
    expect(result.value.establishedAt.getTime()).toBe(NOW);
    expect(flow.transitions).toEqual([
      "start",
      "credentials-submitted",
      "challenge-detected",
      "challenge-solved",
      "session-verified",
    ]);
    expect(flow.transitions.length - 1).toBeLessThanOrEqual(4);
  });

  it("should fill credentials by name and type the code into the challenge input", async () => {
    installLoginApp(driver, { secret: "BASE32SECRET", challenge: true });

    await controller(driver).authenticate();

    const code = currentCode("BASE32SECRET", 30, 6, NOW);
    expect(driver.calls).toEqual([
      "navigate https://x/login",
      "fill username u",
      "fill password p",
      "click submit",
      `fill otp ${code}`,
      "click verify",
    ]);
  });

  it("should fail, never verify, when the code is wrong", async () => {
    installLoginApp(driver, { secret: "JBSWY3DPEHPK3PXP", challenge: true });
    const flow = controller(driver);

    const result = await flow.authenticate();

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(AuthenticationError);
    expect(result.error.message).toBe("One-time code was rejected");
    expect(flow.currentState).toBe("failed");
    expect(flow.transitions).not.toContain("session-verified");
  });

  it("should type one digit per box on split inputs", async () => {
    installLoginApp(driver, { secret: "BASE32SECRET", challenge: true, splitBoxes: true });

    const result = await controller(driver).authenticate();

    expect(result.ok).toBe(true);
    const digits = currentCode("BASE32SECRET", 30, 6, NOW).split("");
    expect(driver.calls.slice(4)).toEqual(digits.map((d, i) => `fill box${i} ${d}`));
  });

  it("should wait out a window with less than the margin left and enter the next code", async () => {
    const rollover = NOW + 30_000;
    installLoginApp(driver, { secret: "BASE32SECRET", challenge: true, codeAt: rollover });
    // 0.7s left: below a one-second margin even though whole seconds would read 1.
    const flow = controller(driver, { freshCodeMarginSeconds: 1 }, () => rollover - 700);

    const result = await flow.authenticate();

    expect(result.ok).toBe(true);
    expect(driver.calls).toContain(`fill otp ${currentCode("BASE32SECRET", 30, 6, rollover)}`);
  });

  it("should accept a missing challenge under the optional policy", async () => {
    installLoginApp(driver, { secret: "BASE32SECRET", challenge: false });
    const flow = controller(driver);

    const result = await flow.authenticate();

    expect(result.ok && result.value.challenge).toBe("skipped");
    expect(flow.transitions).toEqual(["start", "credentials-submitted", "session-verified"]);
  });

  it("should refuse a missing challenge under the required policy", async () => {
    installLoginApp(driver, { secret: "BASE32SECRET", challenge: false });
    const flow = controller(driver, { challengePolicy: "required" });

    const result = await flow.authenticate();

    expect(result.ok).toBe(false);
    expect(flow.transitions).toEqual(["start", "credentials-submitted", "failed"]);
  });

  it("should report rejected credentials", async () => {
    installLoginApp(driver, { secret: "BASE32SECRET", challenge: true, password: "other" });

    const result = await controller(driver).authenticate();

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe("Credentials were rejected by the login form");
  });

  it("should surface an unreachable login page as a navigation error", async () => {
    driver.unreachable.add("https://x/login");
    const flow = controller(driver);

    const result = await flow.authenticate();

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(NavigationError);
    expect(result.error.message).toBe(
      "Could not load https://x/login: net::ERR_NAME_NOT_RESOLVED at https://x/login"
    );
    expect(flow.transitions).toEqual(["start", "failed"]);
  });

  it("should time out when nothing follows the password step", async () => {
    driver.onNavigate = () => {
      driver.place('input[name="username"]', el("username"));
      driver.place('input[name="password"]', el("password"));
      driver.place('button[type="submit"]', el("submit"));
    };

    const result = await controller(driver, { challengeTimeoutMs: 30 }).authenticate();

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe(
      "Neither a second-factor prompt nor the authenticated area appeared within 30ms"
    );
  });

  it("should name the missing login field", async () => {
    const result = await controller(driver).authenticate();

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe(
      'Login form username field missing: No visible, enabled element for `input[name="username"]`'
    );
  });

  it("should run only once", async () => {
    installLoginApp(driver, { secret: "BASE32SECRET", challenge: false });
    const flow = controller(driver);
    await flow.authenticate();

    await expect(flow.authenticate()).rejects.toThrow("authenticate() already ran");
  });
});
