import { errorResponse, fileExtension, jsonResponse, readFormData } from "../lib/http"
import type { ServerContext } from "../server-context"
import { ImageDecodeError, type DecodedPayload } from "../services/qr-decoder"
import { assessPayload, assessmentBody } from "./check-safety"

// Room for boundaries and part headers around the file itself.
const MULTIPART_OVERHEAD_BYTES = 16 * 1024

export async function handleScan(request: Request, ctx: ServerContext): Promise<Response> {
  const bodyLimit = ctx.config.upload.maxBytes + MULTIPART_OVERHEAD_BYTES
  const declaredLength = Number.parseInt(request.headers.get("content-length") ?? "", 10)
  if (Number.isFinite(declaredLength) && declaredLength > bodyLimit) {
    return errorResponse(413, "Upload too large", { max_bytes: ctx.config.upload.maxBytes })
  }

  const parsed = await readFormData(request, bodyLimit)
  if (parsed.kind === "too_large") {
    return errorResponse(413, "Upload too large", { max_bytes: ctx.config.upload.maxBytes })
  }

  if (parsed.kind === "invalid") {
    return errorResponse(400, "Expected a multipart/form-data upload")
  }

  const { form } = parsed

  const file = form.get("file")
  if (file === null || typeof file === "string") {
    return errorResponse(400, "No file uploaded")
  }

  if (!file.name) {
    return errorResponse(400, "No selected file")
  }

  if (!ctx.config.upload.allowedExtensions.includes(fileExtension(file.name))) {
    return errorResponse(400, "Invalid file type", {
      allowed_extensions: ctx.config.upload.allowedExtensions,
    })
  }

  if (file.size > ctx.config.upload.maxBytes) {
    return errorResponse(413, "Upload too large", { max_bytes: ctx.config.upload.maxBytes })
  }

  const bytes = new Uint8Array(await file.arrayBuffer())

  let decoded: DecodedPayload[]
  try {
    decoded = await ctx.qrDecoder.decode(bytes)
  } catch (error) {
    if (error instanceof ImageDecodeError) {
      return errorResponse(422, "Image could not be decoded", { message: error.message })
    }
    throw error
  }

  const first = decoded[0]
  if (!first) {
    return errorResponse(404, "No QR code found")
  }

  const assessment = await assessPayload(first.data, ctx)

  return jsonResponse({
    results: decoded.map((payload) => ({
      data: payload.data,
      location: payload.location,
    })),
    assessment: assessmentBody(assessment),
  })
}
