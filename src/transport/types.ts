/** Outbound side of the chat service. `target` is a member handle or a channel. */
export interface ChatTransport {
    post(target: string, text: string): Promise<void>
}

export interface OperatorAlerts {
    notify(adminHandle: string, text: string): Promise<void>
}

/** Yields one raw card identifier per scan. */
export interface CardReader {
    scans(): AsyncIterable<string>
}
