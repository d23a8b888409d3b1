/**
 * Blocking, user-facing error surface. Implemented by `<brewmap-error-dialog>`.
 */
export interface AlertPresenter {
    showError(message: string): void;
}
