// ==============================================================================
// ESLINT FLAT CONFIG
// Uses plugin presets with minimal overrides for the bridge sources.
// ==============================================================================

import stylistic from '@stylistic/eslint-plugin'
import importX from 'eslint-plugin-import-x'
import jsdoc from 'eslint-plugin-jsdoc'
import sonarjs from 'eslint-plugin-sonarjs'
import tseslint from 'typescript-eslint'

import type { Linter } from 'eslint'

type Rules = Linter.RulesRecord

// ----------------------------------------------------------
// STYLISTIC CONFIG (customize preset)
// ----------------------------------------------------------

const stylisticConfig = stylistic.configs.customize({
  indent: 2, quotes: 'single', semi: true, commaDangle: 'never', braceStyle: '1tbs',
})

// ----------------------------------------------------------
// RULE SETS
// ----------------------------------------------------------

const stylisticOverrides: Rules = {
  '@stylistic/no-multi-spaces': ['error', { ignoreEOLComments: true }],
  '@stylistic/quote-props': 'off',
  '@stylistic/arrow-parens': 'off',
  '@stylistic/max-statements-per-line': 'off',
  '@stylistic/indent-binary-ops': 'off',
  '@stylistic/padded-blocks': 'off',
  '@stylistic/operator-linebreak': 'off',
}

const jsdocRules: Rules = {
  'jsdoc/check-syntax': 'error',
  'jsdoc/check-param-names': 'error',
  'jsdoc/check-tag-names': ['error', { definedTags: ['internal'] }],
  'jsdoc/check-alignment': 'error',
  'jsdoc/empty-tags': 'error',
  'jsdoc/require-param-type': 'off',
  'jsdoc/require-returns-type': 'off',
}

const qualityRules: Rules = {
  'eqeqeq': ['error', 'always', { null: 'ignore' }],
  'no-var': 'error',
  'no-console': 'off',
  'no-constant-condition': ['error', { checkLoops: false }],
  'no-empty': 'error',
  'no-throw-literal': 'error',
  'max-depth': ['warn', 4],
  'max-params': ['warn', 5],
  'complexity': ['warn', 15],
  'sonarjs/cognitive-complexity': ['warn', 15],
  'sonarjs/no-identical-functions': 'warn',
  'sonarjs/no-duplicated-branches': 'error',
  'sonarjs/no-collapsible-if': 'warn',
  'sonarjs/no-redundant-jump': 'error',
  'sonarjs/no-all-duplicated-branches': 'error',
}

const tsRules: Rules = {
  '@typescript-eslint/no-unused-vars': ['error', { argsIgnorePattern: '^_', varsIgnorePattern: '^_', caughtErrorsIgnorePattern: '^_' }],
  '@typescript-eslint/no-explicit-any': 'error',
  '@typescript-eslint/no-non-null-assertion': 'error',
  '@typescript-eslint/no-floating-promises': 'error',
  '@typescript-eslint/consistent-type-imports': 'error',
}

const importRules: Rules = {
  'import-x/order': ['error', {
    'groups': ['builtin', 'external', 'internal', ['parent', 'sibling', 'index'], 'type'],
    'newlines-between': 'always',
    'alphabetize': { order: 'asc', caseInsensitive: true },
  }],
}

// Relaxed for tests
const relaxedRules: Rules = {
  'max-depth': 'off', 'max-params': 'off', 'complexity': 'off',
  'sonarjs/cognitive-complexity': 'off', 'sonarjs/no-identical-functions': 'off',
  '@typescript-eslint/no-floating-promises': 'off',
}

// ==============================================================================
// MAIN CONFIG
// ==============================================================================

export default tseslint.config(
  { ignores: ['node_modules/**', 'dist/**', 'coverage/**', 'logs/**'] },

  // SOURCE FILES
  {
    files: ['src/**/*.ts'],
    ignores: ['src/**/*.test.ts'],
    languageOptions: {
      parser: tseslint.parser,
      parserOptions: { project: ['./tsconfig.json'], ecmaVersion: 2022, sourceType: 'module' },
    },
    plugins: { '@stylistic': stylistic, '@typescript-eslint': tseslint.plugin, 'import-x': importX, 'jsdoc': jsdoc, 'sonarjs': sonarjs },
    rules: { ...stylisticConfig.rules, ...stylisticOverrides, ...jsdocRules, ...qualityRules, ...tsRules, ...importRules },
  },

  // TEST FILES
  {
    files: ['src/**/*.test.ts'],
    languageOptions: {
      parser: tseslint.parser,
      parserOptions: { project: ['./tsconfig.json'], ecmaVersion: 2022, sourceType: 'module' },
    },
    plugins: { '@stylistic': stylistic, '@typescript-eslint': tseslint.plugin, 'sonarjs': sonarjs },
    rules: { ...stylisticConfig.rules, ...stylisticOverrides, ...qualityRules, ...tsRules, ...relaxedRules },
  },

  // CONFIG FILES
  {
    files: ['*.config.ts'],
    languageOptions: {
      parser: tseslint.parser,
      parserOptions: { project: null, ecmaVersion: 2022, sourceType: 'module' },
    },
    plugins: { '@stylistic': stylistic, '@typescript-eslint': tseslint.plugin, 'import-x': importX },
    rules: {
      ...stylisticConfig.rules, ...stylisticOverrides, ...importRules,
      '@stylistic/semi': ['error', 'never'],
      '@stylistic/comma-dangle': ['error', 'always-multiline'],
      '@typescript-eslint/no-unused-vars': 'off',
    },
  },
)
