export interface Logger {
    debug: (messageOrLambda: () => string, namespace: string) => void;
    info: (messageOrLambda: string | (() => string), namespace: string) => void;
    warning: (messageOrLambda: string | (() => string), namespace: string) => void;
    error: (messageOrLambda: string, namespace: string) => void;
}

function format(namespace: string, message: string): string {
    return `[${new Date().toISOString()}] ${namespace}: ${message}`;
}

/* v8 ignore next -- @preserve */
export let logger: Logger = {
    debug: (messageOrLambda, namespace) => console.debug(format(namespace, messageOrLambda())),
    info: (messageOrLambda, namespace) =>
        console.info(format(namespace, typeof messageOrLambda === "function" ? messageOrLambda() : messageOrLambda)),
    warning: (messageOrLambda, namespace) =>
        console.warn(format(namespace, typeof messageOrLambda === "function" ? messageOrLambda() : messageOrLambda)),
    error: (message, namespace) => console.error(format(namespace, message)),
};

/** Swallows everything, for hosts that do not want beacon output */
export const silentLogger: Logger = {
    debug: () => {},
    info: () => {},
    warning: () => {},
    error: () => {},
};

/* v8 ignore next -- @preserve */
export function setLogger(l: Logger): void {
    logger = l;
}
