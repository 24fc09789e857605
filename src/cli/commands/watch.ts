import type { Container } from '../../core/container.js'
import { type MonitorView, StatusMonitor } from '../../monitor/status-monitor.js'
import type { CommandOutcome } from '../runtime.js'
import { colors } from '../ui.js'

function renderLine(view: MonitorView): string {
    const clock = view.tracking ? colors.success(view.elapsed) : colors.dim(view.elapsed)
    const errors = view.errors > 0 ? colors.warn(` (offline x${view.errors})`) : ''
    return `\r\x1b[2K${clock} ${view.label}${errors}`
}

/** Keeps a one-line status on the terminal until interrupted. */
export async function watchCommand(container: Container): Promise<CommandOutcome> {
    const monitor = new StatusMonitor(() => container.timer.activeEntry(), container.logger, {
        render: (view) => process.stdout.write(renderLine(view)),
    })

    await monitor.start()
    await new Promise<void>((resolve) => {
        const finish = () => {
            monitor.stop()
            process.stdout.write('\n')
            resolve()
        }
        process.once('SIGINT', finish)
        process.once('SIGTERM', finish)
    })
    return 'ok'
}
