export const SERVICE_NAME = "slidetext";

export const DEFAULT_PORT = 8000;
export const DEFAULT_HOST = "0.0.0.0";

export const MAX_UPLOAD_MB = 25;

/** LibreOffice cold start plus conversion of a large deck. */
export const CONVERT_TIMEOUT_MS = 60_000;

export const TEMP_DIR_PREFIX = "slidetext-";

export const OUTPUT_FORMATS = ["text", "markdown"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const MIME_TYPES = {
  pptx: "application/vnd.openxmlformats-officedocument.presentationml.presentation",
  ppsx: "application/vnd.openxmlformats-officedocument.presentationml.slideshow",
  docx: "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
  ppt: "application/vnd.ms-powerpoint",
  odp: "application/vnd.oasis.opendocument.presentation",
  doc: "application/msword",
  odt: "application/vnd.oasis.opendocument.text",
  rtf: "application/rtf",
} as const;

export const WELCOME_PAYLOAD = {
  message: "Hello, World!",
  service: SERVICE_NAME,
} as const;
