/**
 * Window Manager Interface
 *
 * The only surface through which the switcher touches the compositor.
 * Implementations reject with BackendError on failure.
 */

import type { WorkspaceId } from '../grid/Grid';

/**
 * A monitor as reported live by the backend.
 * `index` is the position in the backend's own ordering.
 */
export interface MonitorInfo {
    index: number;
    name: string;
    x: number;
    y: number;
    width: number;
    height: number;
}

export interface WindowInfo {
    address: string;
    title: string;
    /** Name of the monitor the window is on */
    monitor: string;
}

export interface WindowManager {
    /** Show `workspaceId` on the named monitor; focus moves to that monitor */
    switchWorkspace(monitorName: string, workspaceId: WorkspaceId): Promise<void>;
    /** Send the focused window to `workspaceId` without following it */
    moveWindowToWorkspace(workspaceId: WorkspaceId): Promise<void>;
    /** Current monitor layout, in backend order */
    monitors(): Promise<MonitorInfo[]>;
    /** Name of the focused monitor, or null when none is reported */
    activeMonitor(): Promise<string | null>;
    /** The focused window, or null when nothing has focus */
    activeWindow(): Promise<WindowInfo | null>;
    /** Send the focused window to the named monitor */
    moveWindowToMonitor(monitorName: string): Promise<void>;
}
