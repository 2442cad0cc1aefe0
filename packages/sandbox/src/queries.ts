/**
 * Shared ECS Queries
 */

import { defineQuery } from 'bitecs'
import { Actor, SimObject } from './components'

/** Every live object, actor included */
export const objectQuery = defineQuery([SimObject])

export const actorQuery = defineQuery([Actor, SimObject])
