/**
 * .gitignore templates by project kind.
 */

export type ProjectKind = 'node' | 'python' | 'default';

export const GITIGNORE_TEMPLATES: Record<ProjectKind, string> = {
  node: `# Node.js
node_modules/
dist/
.env
.DS_Store
logs/
*.log
npm-debug.log*
yarn-debug.log*
yarn-error.log*
`,
  python: `# Python
__pycache__/
*.py[cod]
*.egg-info/
*.egg
*.pyo
*.pyd
.env
.venv/
.DS_Store
logs/
*.log
`,
  default: `# General
.DS_Store
.env
*.log
logs/
`,
};
