import { defineConfig, loadEnv } from 'vite';

export default defineConfig(({ mode }) => {
  const env = loadEnv(mode, process.cwd(), '');
  // Partition files and the AD facility list are large; in dev they usually live on a static host.
  const dataProxyTarget = env.VITE_DATA_PROXY_TARGET;
  return {
    server: {
      port: 5174,
      cors: true,
      strictPort: true,
      proxy: dataProxyTarget
        ? {
            '/leaflet_dmr_json': {
              target: dataProxyTarget,
              changeOrigin: true,
              secure: true,
            },
            '/AnaerobicDigestionFacilities.csv': {
              target: dataProxyTarget,
              changeOrigin: true,
              secure: true,
            },
          }
        : undefined,
    },
    build: {
      sourcemap: true,
      rollupOptions: {
        output: {
          manualChunks: {
            maplibre: ['maplibre-gl'],
          },
        },
      },
    },
    envPrefix: ['VITE_'],
  };
});
