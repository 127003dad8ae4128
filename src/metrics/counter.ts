export interface Counters {
    results_received: number;
    bars_published: number;
    triggers_delivered: number;
    triggers_dropped: number;
    monitor_bugs: number;
    monitor_exits: number;
}

function zeroCounters(): Counters {
    return {
        results_received: 0,
        bars_published: 0,
        triggers_delivered: 0,
        triggers_dropped: 0,
        monitor_bugs: 0,
        monitor_exits: 0,
    };
}

export class Metrics {
    private counters = zeroCounters();

    incrementResultsReceived(): void {
        this.counters.results_received++;
    }

    incrementBarsPublished(): void {
        this.counters.bars_published++;
    }

    incrementTriggersDelivered(): void {
        this.counters.triggers_delivered++;
    }

    incrementTriggersDropped(): void {
        this.counters.triggers_dropped++;
    }

    incrementMonitorBugs(): void {
        this.counters.monitor_bugs++;
    }

    incrementMonitorExits(): void {
        this.counters.monitor_exits++;
    }

    getCounters(): Counters {
        return { ...this.counters };
    }

    reset(): void {
        this.counters = zeroCounters();
    }
}
