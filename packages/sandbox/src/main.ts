import { fileURLToPath } from 'url'
import { loadPrefetchConfig } from './env'
import { SandboxSession } from './session'
import { loadZone, populateZone } from './zone'

const DEFAULT_ZONE = fileURLToPath(new URL('../fixtures/zone.json', import.meta.url))

function main() {
  const zonePath = process.argv[2] ?? DEFAULT_ZONE
  const zone = loadZone(zonePath)
  const config = loadPrefetchConfig()

  const session = new SandboxSession({ sections: zone.sections, config })
  session.start()
  populateZone(session, zone)
  session.update()
  session.end()

  console.log(`[Sandbox] Zone ${zonePath}: ${session.assets.requests.length} model(s) prefetched`)
  for (const path of session.assets.requests) {
    console.log(`[Sandbox]   ${path}`)
  }
}

try {
  main()
} catch (err) {
  console.error('[Sandbox] Fatal error:', err)
  process.exit(1)
}
