export {
    TemplateFormatter,
    renderTemplate,
    type FormatterTable,
    type MessageTemplate,
} from "./TemplateFormatter.js";
export { ScopedFormatter } from "./ScopedFormatter.js";
export {
    cosmosMessages,
    skyExecutiveMessages,
    skyPollMessages,
    snapshotMessages,
    tallyMessages,
    xrplMessages,
} from "./tables.js";
