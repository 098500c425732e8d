import { Box, Text } from "ink";
import type { ClientConfig } from "../config.js";

type Props = {
  headerText: string;
  wordText: string;
  config: ClientConfig;
};

export function RoundBanner({ headerText, wordText, config }: Props) {
  return (
    <Box flexDirection="column" width={config.width} alignItems="center" paddingY={1}>
      <Text color={config.colors.bannerText} backgroundColor={config.colors.banner}>
        {` ${headerText} `}
      </Text>
      <Text bold color={config.colors.bannerText} backgroundColor={config.colors.banner}>
        {` ${wordText} `}
      </Text>
    </Box>
  );
}
