/// <reference types="vite/client" />

// Served by the dashboard-data plugin in src/server/dashboardData.ts.
declare module 'virtual:dashboard-payload' {
  const payload: import('./lib/payload').DashboardPayload;
  export default payload;
}
