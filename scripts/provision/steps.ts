import type { ProvisionStep } from './runner.js';
import { systemUpdateStep } from './step-1-system-update.js';
import { dockerStep } from './step-2-docker.js';
import { composeStep } from './step-3-compose.js';
import { nodeStep } from './step-4-node.js';
import { claudeCliStep } from './step-5-claude-cli.js';
import { pythonSdkStep } from './step-6-python-sdk.js';

// Order matters: compose needs docker, the CLI needs node/npm, and
// system-update provides curl for the docker and node installers.
export const PROVISION_STEPS: readonly ProvisionStep[] = [
  systemUpdateStep,
  dockerStep,
  composeStep,
  nodeStep,
  claudeCliStep,
  pythonSdkStep
];
