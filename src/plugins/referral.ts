import path from "path";
import { GeneratedFile, PluginMetadata } from "../types.js";
import { readTemplate } from "./templates.js";

const MODULE_FILES = [
  "__init__.py",
  "models.py",
  "config.py",
  "exceptions.py",
  "schemas/__init__.py",
  "schemas/referral_schemas.py",
  "services/referral_service.py",
  "routes/referral_routes.py"
] as const;

/**
 * Files of the `referral` module, placed under `<targetDir>/referral`.
 */
export function generateReferralFiles(): GeneratedFile[] {
  return MODULE_FILES.map(file => ({
    path: path.join("referral", ...file.split("/")),
    content: readTemplate("referral", file)
  }));
}

export const referralPlugin: PluginMetadata = {
  name: "referral",
  description: "User referral system with configurable completion strategies and milestone tracking",
  version: "1.0.0",
  dependencies: ["user"],
  filesGenerated: MODULE_FILES.map(file => `referral/${file}`),
  configRequired: true,
  postInstallNotes: `
1. Add a referral_code field to the User model:
   referral_code: Mapped[Optional[str]] = mapped_column(String(20), unique=True, nullable=True)

2. Register the models in alembic_models_import.py:
   from app.referral.models import Referral, ReferralEvent

3. Add completion strategies for your user types in app/referral/config.py

4. Include the router in app/apis/v1.py:
   from app.referral.routes.referral_routes import router as referral_router

5. Trigger referral events from your modules:
   await referral_service.process_event(session, "booking_completed", user_id, {"booking_id": ...})
`,
  contentGenerator: generateReferralFiles
};
