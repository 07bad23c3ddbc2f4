export const SECRET_VAR_NAME = 'ANTHROPIC_API_KEY';

/** Literal value the scaffolded `.env` carries until a real key is supplied. */
export const SECRET_PLACEHOLDER = 'your-api-key-here';

export const DEFAULT_USER = 'pi';
export const WORKSPACE_DIR_NAME = 'claude-workspace';
export const CODE_DIR_NAME = 'workspace';

export const CLAUDE_CLI_PACKAGE = '@anthropic-ai/claude-code';
export const PYTHON_SDK_PACKAGE = 'anthropic';

export const DOCKER_INSTALL_URL = 'https://get.docker.com';
export const DOCKER_INSTALL_SCRIPT = '/tmp/get-docker.sh';

export const KEY_CONSOLE_URL = 'https://console.anthropic.com';

export const WORKSPACE_FILES = {
  compose: 'docker-compose.yml',
  env: '.env',
  launcher: 'start-claude.sh'
} as const;
