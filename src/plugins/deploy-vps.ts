import path from "path";
import { GeneratedFile, PluginMetadata } from "../types.js";
import { readTemplate } from "./templates.js";

// Installs beside the target directory, at the project root.
const DEPLOY_DIR = path.join("..", "deploy-vps");

const GITKEEP = "generated/.gitkeep";

const DEPLOY_FILES = [
  ".gitignore",
  "config.env.example",
  "README.md",
  GITKEEP,
  "scripts/common.sh",
  "scripts/deploy.sh",
  "templates/nginx/api.conf.template",
  "templates/docker/production.compose.yml.template"
] as const;

/**
 * Files of the `deploy-vps` toolkit. The `generated/` placeholder is empty.
 */
export function generateDeployVpsFiles(): GeneratedFile[] {
  return DEPLOY_FILES.map(file => ({
    path: path.join(DEPLOY_DIR, ...file.split("/")),
    content: file === GITKEEP ? "" : readTemplate("deploy_vps", file)
  }));
}

export const deployVpsPlugin: PluginMetadata = {
  name: "deploy_vps",
  description: "VPS deployment toolkit with Docker Compose, Nginx, Redis and Celery workers",
  version: "1.0.0",
  dependencies: [],
  filesGenerated: DEPLOY_FILES.map(file => `../deploy-vps/${file}`),
  configRequired: true,
  postInstallNotes: `
1. Go to the deployment directory:
   cd deploy-vps

2. Create your configuration:
   cp config.env.example config.env

3. Make the scripts executable:
   chmod +x scripts/*.sh

4. Deploy:
   ./scripts/deploy.sh init --env production
`,
  contentGenerator: generateDeployVpsFiles
};
