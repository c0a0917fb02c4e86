export function jsonResponse(payload: unknown, status = 200): Response {
  return new Response(JSON.stringify(payload), {
    status,
    headers: {
      "content-type": "application/json; charset=utf-8",
    },
  })
}

export function errorResponse(status: number, message: string, details?: unknown): Response {
  return jsonResponse(
    {
      error: {
        message,
        details,
      },
    },
    status,
  )
}

export async function readJsonBody(request: Request): Promise<unknown> {
  try {
    return await request.json()
  } catch {
    return null
  }
}

export type FormDataResult =
  | { kind: "form"; form: FormData }
  | { kind: "too_large" }
  | { kind: "invalid" }

/**
 * Buffers at most `maxBytes` of the request body, then parses it as form
 * data. The limit holds for chunked uploads that carry no content-length.
 */
export async function readFormData(request: Request, maxBytes: number): Promise<FormDataResult> {
  const body = await readBodyWithLimit(request, maxBytes)
  if (!body) {
    return { kind: "too_large" }
  }

  try {
    const form = await new Response(body, {
      headers: { "content-type": request.headers.get("content-type") ?? "" },
    }).formData()
    return { kind: "form", form }
  } catch {
    return { kind: "invalid" }
  }
}

async function readBodyWithLimit(request: Request, maxBytes: number): Promise<Uint8Array | null> {
  const reader = request.body?.getReader()
  if (!reader) {
    return new Uint8Array(0)
  }

  let total = 0
  const chunks: Uint8Array[] = []

  while (true) {
    const result = await reader.read()
    if (result.done) {
      break
    }

    total += result.value.byteLength
    if (total > maxBytes) {
      await reader.cancel()
      return null
    }

    chunks.push(result.value)
  }

  const merged = new Uint8Array(total)
  let offset = 0
  for (const chunk of chunks) {
    merged.set(chunk, offset)
    offset += chunk.byteLength
  }

  return merged
}

export function fileExtension(filename: string): string {
  const dot = filename.lastIndexOf(".")
  return dot < 0 ? "" : filename.slice(dot + 1).toLowerCase()
}
