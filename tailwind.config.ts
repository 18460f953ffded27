import type { Config } from 'tailwindcss';

const config: Config = {
  content: ['./index.html', './src/**/*.{ts,tsx}'],
  theme: {
    extend: {
      colors: {
        dash: {
          bg: '#111827',
          panel: '#1f2937',
          border: '#374151',
          accent: '#4ade80',
          danger: '#ef4444',
          warning: '#eab308',
          success: '#4ade80',
          muted: '#6b7280',
          'text-primary': '#f3f4f6',
          'text-secondary': '#9ca3af',
        },
      },
      fontSize: {
        caption: ['0.75rem', { lineHeight: '1rem' }],
        body: ['0.875rem', { lineHeight: '1.375rem' }],
        heading: ['1rem', { lineHeight: '1.5rem', fontWeight: '600' }],
        display: ['1.5rem', { lineHeight: '2rem', fontWeight: '700' }],
      },
    },
  },
  plugins: [],
};

export default config;
