import type { Config } from 'tailwindcss';

// Loaded from globals.css through @config; v4 finds the source files itself.
export default {
  theme: {
    extend: {
      maxWidth: {
        '5xl': '64rem',
      },
    },
  },
  plugins: [],
} satisfies Config;
