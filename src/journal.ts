import { pino } from "pino";

export type LogLevel = pino.LevelWithSilent;

export class Journal {
    private logger: pino.Logger;

    static Root(level: LogLevel = "info"): Journal {
        return new Journal([], {}, level);
    }

    private constructor(
        private component: string[],
        private additional_bindings: Record<string, string | number> = {},
        private level: LogLevel = "info")
    {
        this.logger = pino({
            level,
            formatters: {
                bindings: () => ({
                    component: this.component.join("."),
                    ...this.additional_bindings,
                }),
                level: (label) => ({ level: label.toUpperCase() }),
            }
        });
    }

    public child(
        child_component: string,
        additional_bindings: Record<string, string | number> = {}): Journal
    {
        return new Journal([...this.component, child_component], {
            ...this.additional_bindings,
            ...additional_bindings,
        }, this.level);
    }

    public log(): pino.Logger {
        return this.logger;
    }
}
