import base from "../eslint.base.config";
import globals from "globals";

export default [
  ...base,
  {
    files: ["**/*.ts"],
    ignores: ["eslint.config.ts"],
    languageOptions: {
      parserOptions: {
        tsconfigRootDir: import.meta.dirname,
      },
      globals: {
        ...globals.node,
      },
    },
  },
  {
    files: ["test/**/*.ts"],
    rules: {
      "@typescript-eslint/explicit-module-boundary-types": "off",
      "@typescript-eslint/unbound-method": "off",
    },
  },
];
