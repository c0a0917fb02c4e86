import jsQR from "jsqr"
import sharp from "sharp"

export class ImageDecodeError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "ImageDecodeError"
  }
}

export interface DecodedPayload {
  data: string
  location: {
    topLeft: { x: number; y: number }
    bottomRight: { x: number; y: number }
  }
}

/**
 * Rasterizes an uploaded image and reads the QR code in it. One code per
 * image; an empty list means the image decoded fine but held no code.
 */
export class QrDecoder {
  async decode(imageBytes: Uint8Array): Promise<DecodedPayload[]> {
    let raster: { data: Buffer; info: sharp.OutputInfo }
    try {
      raster = await sharp(imageBytes).ensureAlpha().raw().toBuffer({ resolveWithObject: true })
    } catch (error) {
      throw new ImageDecodeError(
        `Image could not be decoded: ${error instanceof Error ? error.message : String(error)}`,
      )
    }

    const { data, info } = raster
    const pixels = new Uint8ClampedArray(data.buffer, data.byteOffset, data.byteLength)
    const code = jsQR(pixels, info.width, info.height, { inversionAttempts: "attemptBoth" })

    if (!code || code.data.length === 0) {
      return []
    }

    return [
      {
        data: code.data,
        location: {
          topLeft: { x: code.location.topLeftCorner.x, y: code.location.topLeftCorner.y },
          bottomRight: { x: code.location.bottomRightCorner.x, y: code.location.bottomRightCorner.y },
        },
      },
    ]
  }
}
