import base from "../../eslint.base.config";

export default [
  ...base,
  {
    files: ["**/*.ts"],
    ignores: ["eslint.config.ts"],
    languageOptions: {
      parserOptions: {
        tsconfigRootDir: import.meta.dirname,
      },
    },
  },
];
