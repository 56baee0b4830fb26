import type { SessionClaims } from "@/lib/auth";
import type { AppConfig } from "@/lib/config";
import type { ScoreboardRepository } from "@/lib/repository";
import type { ScoreboardSettings } from "@/lib/scoreboard";

export interface AppDeps {
  repository: ScoreboardRepository;
  config: Pick<AppConfig, "SESSION_SECRET" | "ADMIN_PIN_HASH" | "SESSION_TTL_SECONDS">;
  settings: ScoreboardSettings;
}

export type AppEnv = {
  Variables: {
    session: SessionClaims;
  };
};
