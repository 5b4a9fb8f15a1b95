
type LogFn = (message: string) => void;

let info: LogFn = (message: string) => console.log(message);
let error: LogFn = (message: string) => console.error(message);

export const setLogger = (logger: LogFn, errorLogger: LogFn = logger) => {
    info = logger;
    error = errorLogger;
};

export const log = (message: string) => info(message);

export const logError = (message: string) => error(message);
