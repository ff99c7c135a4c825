import { serve } from '@hono/node-server'
import { loadConfig } from './server-app/config.js'
import { createApp } from './server-app/index.js'

const config = loadConfig()
const app = createApp(config)

console.log(`Server is running on http://localhost:${config.port}`)

const server = serve({
  fetch: app.fetch,
  port: config.port
})

// Graceful shutdown
process.on('SIGINT', () => {
  console.log('\nShutting down gracefully...')
  server.close()
  process.exit(0)
})

process.on('SIGTERM', () => {
  console.log('\nShutting down gracefully...')
  server.close()
  process.exit(0)
})
