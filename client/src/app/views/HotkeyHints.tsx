import { Box, Text } from "ink";
import type { ClientConfig } from "../config.js";

type Props = {
  config: ClientConfig;
};

export function HotkeyHints({ config }: Props) {
  return (
    <Box marginTop={1}>
      <Text bold color={config.colors.hint}>
        Ctrl+C
      </Text>
      <Text color={config.colors.hint}> exit  </Text>
      <Text bold color={config.colors.hint}>
        Esc
      </Text>
      <Text color={config.colors.hint}> clear errors</Text>
    </Box>
  );
}
