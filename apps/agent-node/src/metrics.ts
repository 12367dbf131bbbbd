// =============================================================================
// CANOPY AGENT NODE - Load Sampling
// =============================================================================

import os from 'os';
import type { AgentLoad } from '@canopy/protocol';

interface CpuTicks {
    idle: number;
    total: number;
}

function readCpuTicks(): CpuTicks {
    let idle = 0;
    let total = 0;
    for (const cpu of os.cpus()) {
        for (const ticks of Object.values(cpu.times)) total += ticks;
        idle += cpu.times.idle;
    }
    return { idle, total };
}

function percent(part: number, whole: number): number {
    if (whole <= 0) return 0;
    return Math.min(100, Math.max(0, Math.round((part / whole) * 100)));
}

/**
 * Load reported with each heartbeat. CPU counters are cumulative since boot,
 * so usage is measured over the interval since the previous sample.
 */
export class LoadSampler {
    private last: CpuTicks = readCpuTicks();

    sample(activeJobs: number): AgentLoad {
        const current = readCpuTicks();
        const idle = current.idle - this.last.idle;
        const total = current.total - this.last.total;
        this.last = current;

        const totalMemory = os.totalmem();
        return {
            busy: activeJobs > 0,
            cpuUsage: percent(total - idle, total),
            memoryUsage: percent(totalMemory - os.freemem(), totalMemory),
        };
    }
}
