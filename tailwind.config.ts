import type { Config } from 'tailwindcss';

const config: Config = {
  darkMode: ['class'],
  content: [
    './src/components/**/*.{ts,tsx}',
    './src/app/**/*.{ts,tsx}',
  ],
  theme: {
    extend: {
      colors: {
        background: '#0a0e27',
        foreground: '#ffffff',
        primary: {
          DEFAULT: '#7c3aed',
          foreground: '#ffffff',
          400: '#a78bfa',
          600: '#7c3aed',
          700: '#6d28d9',
        },
        muted: {
          DEFAULT: '#1a1f3a',
          foreground: '#94a3b8',
        },
        warning: {
          DEFAULT: '#f59e0b',
          foreground: '#000000',
        },
        border: 'rgba(139, 92, 246, 0.2)',
        navy: {
          900: '#0a0e27',
          800: '#121638',
          700: '#1a1f3a',
          500: '#252b54',
        },
        surface: {
          DEFAULT: 'rgba(30, 35, 71, 0.8)',
          solid: '#1e2347',
        },
        profit: '#22c55e',
        loss: '#ef4444',
      },
      fontFamily: {
        sans: ['Inter', 'system-ui', 'sans-serif'],
        mono: ['JetBrains Mono', 'Fira Code', 'monospace'],
      },
      borderRadius: {
        lg: '0.75rem',
        md: '0.5rem',
        sm: '0.25rem',
      },
      boxShadow: {
        glow: '0 0 20px rgba(124, 58, 237, 0.15)',
      },
      keyframes: {
        'fade-in': {
          '0%': { opacity: '0', transform: 'translateY(10px)' },
          '100%': { opacity: '1', transform: 'translateY(0)' },
        },
      },
      animation: {
        'fade-in': 'fade-in 0.3s ease-out',
      },
    },
  },
  plugins: [],
};

export default config;
