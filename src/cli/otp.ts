import { loadConfig } from "../config/loader.js";
import { currentCode, secondsRemaining } from "../otp/totp.js";
import { errorMessage } from "../errors.js";
import { log } from "../utils/logger.js";

export async function otpCommand(options: { env?: string }): Promise<void> {
  try {
    const config = await loadConfig(process.cwd(), { environment: options.env });
    const { timeStepSeconds, digits } = config.otp;
    const now = Date.now();

    console.log(currentCode(config.environment.otpSecret, timeStepSeconds, digits, now));
    log.dim(`${config.environmentName}: valid for another ${secondsRemaining(timeStepSeconds, now)}s`);
  } catch (error) {
    log.fail(errorMessage(error));
    process.exit(1);
  }
}
