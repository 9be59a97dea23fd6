import dotenv from "dotenv";

// Load environment variables
dotenv.config();

interface Config {
  // Runtime
  nodeEnv: string;
  logLevel: string;

  // Supabase
  supabaseUrl?: string;
  supabaseServiceKey?: string;

  // Passwords
  bcryptSaltRounds: number;
}

export function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key] || defaultValue;
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

export function getEnvVarOptional(
  key: string,
  defaultValue?: string
): string | undefined {
  return process.env[key] || defaultValue;
}

export function getEnvVarNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Invalid number for environment variable ${key}: ${value}`);
  }
  return parsed;
}

export const config: Config = {
  nodeEnv: getEnvVar("NODE_ENV", "development"),
  logLevel: getEnvVar("LOG_LEVEL", "info"),

  // Checked when the client is first created, so modules load without credentials
  supabaseUrl: getEnvVarOptional("SUPABASE_URL"),
  supabaseServiceKey: getEnvVarOptional("SUPABASE_SERVICE_ROLE_KEY"),

  bcryptSaltRounds: getEnvVarNumber("BCRYPT_SALT_ROUNDS", 12),
};
