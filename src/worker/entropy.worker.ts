/* Worker thread entry: scores guess-pool units on request. */
import { parentPort } from 'node:worker_threads'
import { handleMessage, type Msg } from './protocol'

const port = parentPort
if (port) {
  port.on('message', (msg: Msg) => {
    port.postMessage(handleMessage(msg))
  })
}
