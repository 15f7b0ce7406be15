import 'reflect-metadata'
import 'dotenv/config'
import { serve } from '@hono/node-server'
import { loadBindings } from './config/bindings'
import { createApp } from './index'

const bindings = loadBindings(process.env)
const app = createApp(bindings)

serve({ fetch: app.fetch, port: bindings.PORT }, (info) => {
    console.log(`🌐 Listening on http://localhost:${String(info.port)}`)
})
