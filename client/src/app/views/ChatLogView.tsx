import { Box, Text } from "ink";
import type { ClientConfig } from "../config.js";

type Props = {
  messages: string[];
  config: ClientConfig;
};

export function ChatLogView({ messages, config }: Props) {
  const visibleMessages = messages.slice(-config.chatHeight);

  return (
    <Box
      flexDirection="column"
      justifyContent="flex-end"
      width={config.width}
      height={config.chatHeight + 2}
      borderStyle="round"
      borderColor={config.colors.chatBorder}
      paddingX={1}
    >
      {visibleMessages.map((message, index) => (
        <Text key={`${index}-${message}`} wrap="truncate-end">
          {message}
        </Text>
      ))}
    </Box>
  );
}
