/**
 * Drain a readable stream into a single Buffer
 */
export function streamToBuffer(readableStream: NodeJS.ReadableStream): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = []

    readableStream.on('data', (chunk: Buffer | string) => {
      chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk)
    })

    readableStream.on('end', () => {
      resolve(Buffer.concat(chunks))
    })

    readableStream.on('error', reject)
  })
}
