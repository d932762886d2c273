import { fileExtension } from "@slidetext/file-extract";
import {
  type ExtractQueryInput,
  type ExtractResponse,
  ValidationError,
  extractQuerySchema,
} from "@slidetext/utils";
import type { ApiContext } from "../context.js";

interface Upload {
  filename: string;
  mimeType: string;
  buffer: Buffer;
}

function readQuery(url: string): ExtractQueryInput {
  const result = extractQuerySchema.safeParse(Object.fromEntries(new URL(url).searchParams));
  if (!result.success) {
    const { fieldErrors } = result.error.flatten();
    throw new ValidationError("Invalid query parameters", { format: fieldErrors.format ?? [] });
  }
  return result.data;
}

async function readUpload(request: Request, ctx: ApiContext): Promise<Upload> {
  let formData: FormData;
  try {
    formData = await request.formData();
  } catch {
    throw new ValidationError("Expected multipart/form-data body");
  }

  const file = formData.get("file");
  if (file === null || typeof file === "string") {
    throw new ValidationError("No file provided");
  }
  if (file.name === "") {
    throw new ValidationError("No selected file");
  }
  if (file.size === 0) {
    throw new ValidationError("Uploaded file is empty");
  }
  if (file.size > ctx.maxUploadBytes) {
    throw new ValidationError("File too large");
  }

  return {
    filename: file.name,
    mimeType: file.type,
    buffer: Buffer.from(await file.arrayBuffer()),
  };
}

export async function extractText(request: Request, ctx: ApiContext) {
  const { format } = readQuery(request.url);
  const upload = await readUpload(request, ctx);

  if (!ctx.registry.canExtract(upload.mimeType, upload.filename)) {
    const ext = fileExtension(upload.filename);
    const subject = ext ? `File type ".${ext}"` : `File "${upload.filename}"`;
    throw new ValidationError(
      `${subject} is not supported. Supported types: ${ctx.registry.supportedExtensions().join(", ")}`,
    );
  }

  const started = performance.now();
  const result = await ctx.registry.extract(
    upload.buffer,
    upload.mimeType,
    upload.filename,
    format,
  );
  console.info(
    "[extract]",
    upload.filename,
    `${upload.buffer.length}B`,
    format,
    `${Math.round(performance.now() - started)}ms`,
  );

  const body: ExtractResponse = {
    filename: upload.filename,
    format,
    text: result.text,
    sections: result.sections,
    metadata: result.metadata,
  };
  return Response.json(body);
}
