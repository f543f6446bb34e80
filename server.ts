// server.ts
// ⬇️ keep real file imports with .js for NodeNext ESM
import { AppState } from './src/lib/appState.js'
import type { BatteryControl } from './src/lib/backend/battery.js'
import { loadConfig } from './src/lib/config.js'
import { WorkspacePoller } from './src/lib/compositor/poller.js'
import { errorMessage } from './src/lib/errors.js'
import { startEventStream, type EventStream } from './src/lib/eventStream.js'
import { CommandServer } from './src/lib/ipc/server.js'
import { LOG } from './src/lib/logger.js'
import { SystemSampler } from './src/lib/sampler.js'
import { VERSION } from './src/lib/version.js'

const log = LOG.tag('daemon')

process.on('unhandledRejection', reason => log.error(`unhandled rejection: ${errorMessage(reason)}`))

/** Re-reads the battery on a fixed interval; a poll never overlaps the previous one. */
function startBatteryRefresh(battery: BatteryControl, intervalMs: number): () => void {
  let inFlight = false
  const tick = () => {
    if (inFlight) return
    inFlight = true
    battery
      .refresh()
      .catch(err => log.debug(`battery refresh failed: ${errorMessage(err)}`))
      .finally(() => {
        inFlight = false
      })
  }
  const timer = setInterval(tick, intervalMs)
  timer.unref?.()
  return () => clearInterval(timer)
}

async function main() {
  const config = loadConfig()
  log.info(`deskbar ${VERSION} starting`)

  const state = AppState.create(config)
  void state.ready().then(() => {
    for (const { name, status } of state.summary()) log.info(`${name}: ${status}`)
  })

  const server = new CommandServer({
    state,
    socketPath: config.socketPath,
    idleTimeoutMs: config.clientIdleTimeoutMs,
    volumeStep: config.volumeStep,
    brightnessStep: config.brightnessStep,
  })
  await server.listen()

  const sampler = new SystemSampler({
    bus: state.bus,
    intervalMs: config.samplerIntervalMs,
    temperatureIntervalMs: config.temperatureIntervalMs,
  })
  sampler.start()

  let poller: WorkspacePoller | null = null
  if (state.compositor.kind === 'present') {
    poller = new WorkspacePoller({ client: state.compositor.control, bus: state.bus, intervalMs: config.compositorPollMs })
    poller.start()
  } else {
    log.info('compositor client not available, skipping workspace polling')
  }

  const stopBattery =
    state.battery.kind === 'present' ? startBatteryRefresh(state.battery.control, config.batteryPollMs) : () => {}

  let stream: EventStream | null = null
  if (config.eventStreamPort !== null) {
    try {
      stream = await startEventStream(state.bus, config.eventStreamPort)
    } catch (err) {
      log.error(`event stream not started: ${errorMessage(err)}`)
    }
  }

  let stopping = false
  const shutdown = async (signal: string) => {
    if (stopping) return
    stopping = true
    log.info(`${signal} received, shutting down`)
    poller?.stop()
    sampler.stop()
    stopBattery()
    await Promise.allSettled([server.close(), stream?.close(), state.shutdown()])
    process.exit(0)
  }
  process.on('SIGINT', () => void shutdown('SIGINT'))
  process.on('SIGTERM', () => void shutdown('SIGTERM'))
}

main().catch(err => {
  log.error(`startup failed: ${errorMessage(err)}`)
  process.exit(1)
})
