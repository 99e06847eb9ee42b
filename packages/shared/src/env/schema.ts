export type EnvSchema = {
  required: string[];
  optional?: string[];
  allowEmpty?: string[];
};

export type EnvService = "orchestrator";

export const ENV_SCHEMAS: Record<EnvService, EnvSchema> = {
  orchestrator: {
    required: ["RECOVERY_CONFIG", "LOGS_DIR"],
    optional: ["SESSION_ID", "CONFIG_WATCH", "LOG_LEVEL", "ENV_FILE"],
    allowEmpty: ["SESSION_ID", "CONFIG_WATCH", "LOG_LEVEL"]
  }
};
