/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_NOMINATIM_URL?: string;
  readonly VITE_OVERPASS_URL?: string;
  readonly VITE_GOOGLE_FONTS_CSS_URL?: string;
  readonly VITE_CACHE_NAMESPACE?: string;
  readonly VITE_DEBUG?: string;
}
