import { defineConfig } from 'vite';
import react from '@vitejs/plugin-react';
import { dashboardData } from './src/server/dashboardData';

// Forecast data is loaded once by the server process; the page receives the
// result as a module and makes no requests of its own.
export default defineConfig({
  plugins: [react(), dashboardData()],
  server: {
    port: 8050,
    strictPort: true,
  },
});
