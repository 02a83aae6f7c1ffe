"use client";

import React, { useEffect, useRef } from "react";
import type { ItemAdapter } from "../types";
import { createPointCloudViewer, type PointCloudViewerHandle } from "../viewer/createPointCloudViewer";
import type { PickResult } from "../viewer/PointCloudViewer";
import type { CameraState, ViewerConfig } from "../viewer/types/camera";

export type PointCloudViewProps<T> = {
    items: readonly T[];
    adapter: ItemAdapter<T>;
    perspective?: boolean;
    camera?: Partial<CameraState>;
    config?: Partial<ViewerConfig>;
    className?: string;
    onSelect?: (hit: PickResult<T> | null) => void;
    onHover?: (hit: PickResult<T> | null) => void;
};

export function PointCloudView<T>({
    items,
    adapter,
    perspective,
    camera,
    config,
    className,
    onSelect,
    onHover,
}: PointCloudViewProps<T>) {
    const containerRef = useRef<HTMLDivElement | null>(null);
    const viewerRef = useRef<PointCloudViewerHandle<T> | null>(null);

    // Camera and config are read once at mount.
    useEffect(() => {
        if (!containerRef.current) return;
        const handle = createPointCloudViewer<T>({
            container: containerRef.current,
            items,
            adapter,
            camera,
            config,
            onSelect,
            onHover,
        });
        viewerRef.current = handle;
        return () => {
            handle.dispose();
            viewerRef.current = null;
        };
    }, []);

    useEffect(() => {
        viewerRef.current?.setDataset(items, adapter);
    }, [items, adapter]);

    useEffect(() => {
        const handle = viewerRef.current;
        if (!handle || perspective === undefined) return;
        if (handle.isPerspectiveEnabled() !== perspective) {
            handle.togglePerspective();
        }
    }, [perspective]);

    useEffect(() => {
        viewerRef.current?.setHandlers({ onSelect, onHover });
    }, [onSelect, onHover]);

    return <div ref={containerRef} className={className} style={{ position: "relative" }} />;
}
