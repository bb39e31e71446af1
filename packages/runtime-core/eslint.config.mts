import tseslint from 'typescript-eslint';
import globals from "globals";

// The core talks to the engine only through its interfaces; no Node.js globals here
export default tseslint.config(
	{
		languageOptions: {
			globals: {
				...globals.es2021,
			},
			parserOptions: {
				projectService: true,
				tsconfigRootDir: import.meta.dirname,
			},
		},
	},
	...tseslint.configs.recommended,
	{
		rules: {
			"@typescript-eslint/no-unused-vars": [
				"error",
				{
					argsIgnorePattern: "^_",
					varsIgnorePattern: "^_",
				},
			],
			"@typescript-eslint/consistent-type-imports": ["error", { fixStyle: "inline-type-imports" }],
			"no-restricted-imports": ["error", { patterns: ["node:*", "fs", "path", "vm", "v8"] }],
		},
	},
	{
		files: ["src/__tests__/**/*.ts"],
		languageOptions: {
			globals: {
				...globals.node,
			},
		},
		rules: {
			"@typescript-eslint/no-implied-eval": "off",
		},
	},
	{
		ignores: [
			"node_modules/**",
			"*.config.{js,mjs,ts,mts}",
		],
	},
);
