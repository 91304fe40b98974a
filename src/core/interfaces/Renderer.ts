import { UpdateBus } from "../services/UpdateBus";

/**
 * Displays the updates published by the session controller.
 */
export interface Renderer {
    /**
     * Prepares the output.
     * @throws RendererInitError when the output cannot be used.
     */
    open(): void;

    /** Renders updates until the user quits or `signal` aborts. */
    run(bus: UpdateBus, signal: AbortSignal): Promise<void>;

    close(): void;
}
