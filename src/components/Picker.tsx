import React, { useState } from "react";
import { Box, Text, useApp, useInput } from "ink";
import type { Shortcut } from "../types.js";
import { formatCommandLine } from "../shortcuts.js";
import { normalizeError } from "../errors.js";

interface PickerProps {
  shortcuts: Shortcut[];
  onSelect: (name: string) => void;
  /** May throw; the shortcut then stays in the list and the error is shown */
  onRemove: (name: string) => void;
  selectedColor?: string;
}

export function Picker({
  shortcuts: initialShortcuts,
  onSelect,
  onRemove,
  selectedColor = "#FFD700",
}: PickerProps) {
  const { exit } = useApp();
  const [shortcuts, setShortcuts] = useState(initialShortcuts);
  const [selectedIndex, setSelectedIndex] = useState(0);
  const [confirmDelete, setConfirmDelete] = useState<string | null>(null);
  const [removeError, setRemoveError] = useState<string | null>(null);

  const nameWidth = Math.max(4, ...shortcuts.map((s) => s.name.length));

  useInput((input, key) => {
    // Handle delete confirmation
    if (confirmDelete) {
      if (input === "y" || input === "Y") {
        try {
          onRemove(confirmDelete);
        } catch (err) {
          setRemoveError(normalizeError(err).message);
          setConfirmDelete(null);
          return;
        }
        setRemoveError(null);
        const remaining = shortcuts.filter((s) => s.name !== confirmDelete);
        setShortcuts(remaining);
        setConfirmDelete(null);
        // Adjust selection if needed
        if (selectedIndex >= remaining.length) {
          setSelectedIndex(Math.max(0, remaining.length - 1));
        }
      } else if (input === "n" || input === "N" || key.escape) {
        setConfirmDelete(null);
      }
      return;
    }

    if (key.escape || input === "q") {
      exit();
      return;
    }

    if (shortcuts.length === 0) return;

    // Navigation
    if (key.upArrow) {
      setSelectedIndex((prev) => (prev > 0 ? prev - 1 : shortcuts.length - 1));
      return;
    }

    if (key.downArrow) {
      setSelectedIndex((prev) => (prev < shortcuts.length - 1 ? prev + 1 : 0));
      return;
    }

    if (key.return) {
      onSelect(shortcuts[selectedIndex].name);
      exit();
      return;
    }

    // Ctrl+D - delete shortcut
    if (key.ctrl && input === "d") {
      setConfirmDelete(shortcuts[selectedIndex].name);
    }
  });

  return (
    <Box flexDirection="column">
      <Box>
        <Text color="gray" dimColor>
          ── Projexts ───────────────────
        </Text>
      </Box>

      {shortcuts.length === 0 && (
        <Box>
          <Text color="gray" dimColor>
            {"  "}No shortcuts yet. Add one with: projexts add &lt;name&gt; -- &lt;command&gt;
          </Text>
        </Box>
      )}

      {shortcuts.map((sc, idx) => {
        const isSelected = idx === selectedIndex;
        const isDeleting = confirmDelete === sc.name;

        return (
          <Box key={sc.name}>
            <Text color={isSelected ? selectedColor : undefined} bold={isSelected}>
              {isSelected ? "> " : "  "}
              {sc.name.padEnd(nameWidth)}
            </Text>
            <Text dimColor>{"  "}{formatCommandLine(sc)}</Text>
            {isDeleting && (
              <Text color="red"> Delete? (y/n)</Text>
            )}
          </Box>
        );
      })}

      {removeError && (
        <Box>
          <Text color="red">
            {"  "}Error: {removeError}
          </Text>
        </Box>
      )}

      <Box marginTop={1}>
        <Text dimColor>
          {"  "}↑↓ navigate{shortcuts.length > 0 ? " • enter run • ^D delete" : ""} • esc quit
        </Text>
      </Box>
    </Box>
  );
}
