export const APP_NAME = "slide-pilot";
export const APP_VERSION = "0.1.0";
