import { ContextMap, isPlainObject } from "../util/Objects";

/**
 * What a unit of work (or a group) knows: what it receives, what it does, what it produced and the
 * open context map it shares with its collaborators.
 */
export class ContextInfo {

    inputDescription: string = "";
    actionSummary: string = "";
    outcomeDescription: string = "";
    feedback: string[] = [];
    output: ContextMap = {};
    context: ContextMap = {};

    static fromJSON(data: unknown): ContextInfo {

        const info = new ContextInfo();

        if (!isPlainObject(data)) return info;

        if (typeof data.inputDescription === "string") info.inputDescription = data.inputDescription;
        if (typeof data.actionSummary === "string") info.actionSummary = data.actionSummary;
        if (typeof data.outcomeDescription === "string") info.outcomeDescription = data.outcomeDescription;
        if (Array.isArray(data.feedback)) info.feedback = data.feedback.map(f => String(f));
        if (isPlainObject(data.output)) info.output = { ...data.output };
        if (isPlainObject(data.context)) info.context = { ...data.context };

        return info;
    }
}
