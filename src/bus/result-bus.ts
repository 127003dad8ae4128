import { Channel } from './channel.js';

/** Latest output of one monitor. `null` clears its slot in the bar. */
export interface MonitorResult {
    id: string;
    text: string | null;
}

export type Emit = (text: string | null) => void;

/**
 * The single channel every monitor pushes to; BarAssembler is its only
 * consumer.
 */
export class ResultBus {
    private channel = new Channel<MonitorResult>();

    push(id: string, text: string | null): void {
        this.channel.send({ id, text });
    }

    /** Emitter bound to one monitor id. */
    emitterFor(id: string): Emit {
        return (text) => this.push(id, text);
    }

    receive(): Promise<MonitorResult> {
        return this.channel.receive();
    }

    get pending(): number {
        return this.channel.pending;
    }
}
