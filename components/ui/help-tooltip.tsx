"use client";

import * as TooltipPrimitive from "@radix-ui/react-tooltip";
import { Info } from "lucide-react";

type TooltipSide = "top" | "right" | "bottom" | "left";

interface HelpTooltipProps {
  /** Help text shown in the tooltip */
  content: string;
  side?: TooltipSide;
}

export function HelpTooltip({ content, side = "top" }: HelpTooltipProps) {
  return (
    <TooltipPrimitive.TooltipProvider delayDuration={400}>
      <TooltipPrimitive.Tooltip>
        <TooltipPrimitive.TooltipTrigger asChild>
          <button
            type="button"
            className="inline-flex h-4 w-4 shrink-0 cursor-help items-center justify-center rounded text-content-muted hover:text-content focus:outline-none focus-visible:ring-2 focus-visible:ring-border"
            aria-label="Help"
          >
            <Info className="h-3 w-3" aria-hidden />
          </button>
        </TooltipPrimitive.TooltipTrigger>
        <TooltipPrimitive.Portal>
          <TooltipPrimitive.Content
            side={side}
            sideOffset={6}
            className="z-50 max-w-xs rounded-md bg-content px-3 py-2 text-sm text-background shadow-md"
          >
            {content}
          </TooltipPrimitive.Content>
        </TooltipPrimitive.Portal>
      </TooltipPrimitive.Tooltip>
    </TooltipPrimitive.TooltipProvider>
  );
}
